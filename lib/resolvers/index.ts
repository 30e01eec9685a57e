export * from './naming';
export * from './identifier';
export * from './subnet-filter';
export * from './security-rules';
export * from './option-document';
export * from './credentials';
export * from './instance-plan';
export * from './deployment-config';
export * from './deployment-plan';
