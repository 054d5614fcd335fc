import { z } from 'zod';

/**
 * Configuration File Schemas
 *
 * Zod schemas for the JSON configuration file. Length agreement between the
 * parallel directory lists is checked here so a mismatch fails before any
 * stage runs.
 */

const directorySchema = z.string().trim().min(1, 'Directory must not be empty');

const sizeFilterSchema = z.object({
  enabled: z.boolean().optional(),
  minSizeMb: z.number().positive('minSizeMb must be positive').optional(),
});

const decodeFilterSchema = z.object({
  enabled: z.boolean().optional(),
  decoder: z.string().min(1).optional(),
});

export const configFileSchema = z
  .object({
    requiredPrograms: z.array(z.string().min(1)).min(1, 'At least one program (the player) is required').optional(),
    paths: z.array(directorySchema.nullable()),
    patterns: z.array(z.string().min(1, 'Pattern must not be empty')),
    weights: z.array(z.number().int('Weights must be integers').positive('Weights must be at least 1')),
    categories: z.array(z.string().trim().min(1)).optional(),
    mountedDirectories: z.array(directorySchema.nullable()).optional(),
    excludeKnownBad: z.boolean().optional(),
    badListDirectory: directorySchema.optional(),
    playlistPath: z.string().min(1).optional(),
    playbackRate: z.number().positive('playbackRate must be positive').optional(),
    quality: z
      .object({
        sizeFilter: sizeFilterSchema.optional(),
        decodeFilter: decodeFilterSchema.optional(),
      })
      .optional(),
  })
  .superRefine((config, ctx) => {
    const expected = config.paths.length;
    const parallel: Array<[string, number | undefined]> = [
      ['patterns', config.patterns.length],
      ['weights', config.weights.length],
      ['categories', config.categories?.length],
    ];
    for (const [key, length] of parallel) {
      if (length !== undefined && length !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} has ${length} entries but paths has ${expected}`,
        });
      }
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;
