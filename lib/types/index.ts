export * from './oracle-database';
export * from './deployment-plan';
export * from './option-document';
export * from '@common/types/common';
