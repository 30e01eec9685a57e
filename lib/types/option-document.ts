import { z } from 'zod';

export const OptionSettingSchema = z.object({
    name: z.string().min(1),
    value: z.string(),
});

export const OptionEntrySchema = z.object({
    option_name: z.string().min(1),
    port: z.number().int().min(1).max(65535).optional(),
    version: z.string().min(1).optional(),
    vpc_security_group_memberships: z.array(z.string().min(1)).optional(),
    option_settings: z.array(OptionSettingSchema).optional(),
});
export type OptionEntry = z.infer<typeof OptionEntrySchema>;

export const ParameterEntrySchema = z.object({
    name: z.string().min(1),
    value: z.string(),
    // Informational only: CloudFormation applies dynamic parameters immediately and static ones at reboot
    apply_method: z.enum(['immediate', 'pending-reboot']).optional(),
});
export type ParameterEntry = z.infer<typeof ParameterEntrySchema>;

/**
 * External document describing parameter group and option group contents
 */
export const OptionDocumentSchema = z.object({
    parameter_group_parameters: z.array(ParameterEntrySchema),
    option_group_options: z.array(OptionEntrySchema),
    ssl_option: z.array(OptionEntrySchema),
});
export type OptionDocument = z.infer<typeof OptionDocumentSchema>;
