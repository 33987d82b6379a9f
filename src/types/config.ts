import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/** Provisioning step: `<command> -i <inventory> <playbook> [...extra_args]`. */
export const ProvisionerConfigSchema = z
  .object({
    command: z.string().min(1).default('ansible-playbook'),
    inventory: z.string().min(1).default('inventory/hosts.ini'),
    playbook: z.string().min(1).default('site.yml'),
    extra_args: z.array(z.string()).default([]),
  })
  .strict();

export const EntrypointConfigSchema = z
  .object({
    provisioner: ProvisionerConfigSchema.default({}),
    log_level: LogLevelSchema.default('info'),
  })
  .strict();

export type ProvisionerConfig = z.infer<typeof ProvisionerConfigSchema>;
export type EntrypointConfig = z.infer<typeof EntrypointConfigSchema>;
