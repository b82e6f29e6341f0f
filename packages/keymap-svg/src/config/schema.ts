import { ConfigErrors, ConfigurationError } from '@keysketch/errors';
import { formatIssues } from '@keysketch/keymap';
import { z } from 'zod';
import { mergeDrawConfig } from './default.js';
import type { DrawConfig } from '../types.js';

const size = z.number().finite().nonnegative();

/**
 * Partial draw config as read from JSON. Unknown keys are rejected so that
 * typos do not silently fall back to defaults.
 */
export const DrawConfigSchema = z
  .object({
    keyRx: size,
    keyRy: size,
    innerPadW: size,
    innerPadH: size,
    outerPadW: size,
    outerPadH: size,
    smallPad: size,
    lineSpacing: size,
    arcRadius: size,
    arcScale: z.number().finite(),
    comboW: size,
    comboH: size,
    glyphTapSize: size,
    glyphHoldSize: size,
    glyphShiftedSize: size,
    appendColonToLayerHeader: z.boolean(),
    svgStyle: z.string(),
    glyphs: z.record(z.string(), z.string()),
  })
  .partial()
  .strict();

/**
 * Validate untyped config data and merge it over the defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseDrawConfig(raw: unknown): DrawConfig {
  const result = DrawConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('INVALID_DRAW_CONFIG', ConfigErrors.INVALID_DRAW_CONFIG(formatIssues(result.error)));
  }
  return mergeDrawConfig(result.data);
}
