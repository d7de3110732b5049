/* src/cli/config/schema.ts
 * Zod schema for backport.config.* (the host file around the attribute mapping).
 * The attributes themselves are validated by the installer's own rules.
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = v.trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

export const cliDefaultsSchema = z
  .object({
    debug: coerceBool,
    boring: coerceBool,
  })
  .strict();

export const configFileSchema = z
  .object({
    attributes: z.record(z.string(), z.unknown(), {
      required_error: 'attributes is required',
      invalid_type_error: 'attributes must be a mapping',
    }),
    cliDefaults: cliDefaultsSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
export type CliDefaults = NonNullable<ConfigFile['cliDefaults']>;
