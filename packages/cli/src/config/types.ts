/**
 * CLI configuration types.
 */
import { z } from 'zod';
import { TOC_FORMATS } from '@tocmark/core';

const marker = z.string().min(1, 'must not be empty');

export const tocmarkConfigSchema = z
  .object({
    format: z.enum(TOC_FORMATS).optional(),
    bullet: z.string().min(1, 'must not be empty').optional(),
    beginMarker: marker.optional(),
    endMarker: marker.optional(),
  })
  .strict();

export type TocmarkConfig = z.infer<typeof tocmarkConfigSchema>;

export interface LoadedConfig {
  path: string;
  config: TocmarkConfig;
}
