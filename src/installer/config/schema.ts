/* src/installer/config/schema.ts
 * Zod schema for the raw attribute mapping consumed by reconfigure().
 * Every rule is independent; all failures are reported together.
 * The verify_checksum/expected_checksum pairing is checked by the resolver.
 */
import path from 'node:path';

import { z } from 'zod';

import { MAX_TIMER_MS } from '@/installer/util/sleep';

/** Longest interval or timeout, in seconds, that fits one Node timer. */
export const MAX_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

const requiredText = (
  name: string,
  message = `${name} must be a non-empty string`,
) =>
  z
    .string({
      required_error: `${name} is required`,
      invalid_type_error: message,
    })
    .trim()
    .min(1, { message });

const flag = (name: string) =>
  z.boolean({ invalid_type_error: `${name} must be a boolean` }).optional();

const positiveSeconds = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a positive number` })
    .finite({ message: `${name} must be a positive number` })
    .positive({ message: `${name} must be a positive number` })
    .max(MAX_SECONDS, {
      message: `${name} must be at most ${String(MAX_SECONDS)} seconds`,
    })
    .optional();

const optionalText = (name: string) => requiredText(name).optional();

export const attributesSchema = z
  .object({
    backport_url: z
      .string({
        required_error: 'backport_url is required',
        invalid_type_error: 'backport_url must be a valid HTTP/HTTPS URL',
      })
      .refine((v) => v.startsWith('http://') || v.startsWith('https://'), {
        message: 'backport_url must be a valid HTTP/HTTPS URL',
      }),
    target_version: requiredText('target_version'),
    work_dir: requiredText('work_dir'),
    platform: requiredText('platform'),
    description: z
      .string({ invalid_type_error: 'description must be a string' })
      .optional(),
    auto_install: flag('auto_install'),
    check_interval: positiveSeconds('check_interval'),
    force_reinstall: flag('force_reinstall'),
    cleanup_after_install: flag('cleanup_after_install'),
    restart_dependent_service: flag('restart_dependent_service'),
    managed_service: optionalText('managed_service'),
    dependent_service: optionalText('dependent_service'),
    verify_checksum: flag('verify_checksum'),
    expected_checksum: z
      .string({ invalid_type_error: 'expected_checksum must be a string' })
      .trim()
      .regex(/^[0-9a-fA-F]{64}$/, {
        message: 'expected_checksum must be a hex SHA-256 digest',
      })
      .optional(),
    command_timeout: positiveSeconds('command_timeout'),
    base_dir: z
      .string({ invalid_type_error: 'base_dir must be an absolute path' })
      .refine((v) => path.isAbsolute(v), {
        message: 'base_dir must be an absolute path',
      })
      .optional(),
  });

export type Attributes = z.infer<typeof attributesSchema>;
