import fs from 'node:fs/promises';
import { z } from 'zod';

export type PaletteMode = 'none' | 'two-pass';
export type DitherMode = 'bayer' | 'floyd_steinberg' | 'sierra2_4a' | 'none';

export type ConversionProfileEntry = {
  name: string;
  fps: number;
  width: number; // height follows the source aspect ratio
  palette: PaletteMode;
  dither: DitherMode;
  bayerScale?: number; // only read when dither is 'bayer'
  maxColors?: number; // palettegen max_colors, 256 when absent
};

/** Ordered highest quality (largest output) first. */
export type ConversionProfile = readonly ConversionProfileEntry[];

export const DEFAULT_LADDER: ConversionProfile = Object.freeze([
  { name: 'high', fps: 12, width: 320, palette: 'two-pass', dither: 'bayer', bayerScale: 5, maxColors: 256 },
  { name: 'medium', fps: 10, width: 280, palette: 'two-pass', dither: 'bayer', bayerScale: 4, maxColors: 128 },
  { name: 'low', fps: 8, width: 250, palette: 'two-pass', dither: 'bayer', bayerScale: 3, maxColors: 64 },
  { name: 'minimal', fps: 6, width: 200, palette: 'none', dither: 'none' },
]);

const entrySchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, 'profile names may only contain letters, digits, "-" and "_"'),
  fps: z.number().int().min(1).max(60),
  width: z.number().int().min(16).max(4096),
  palette: z.enum(['none', 'two-pass']),
  dither: z.enum(['bayer', 'floyd_steinberg', 'sierra2_4a', 'none']),
  bayerScale: z.number().int().min(0).max(5).optional(),
  maxColors: z.number().int().min(2).max(256).optional(),
});

export const ladderSchema = z
  .array(entrySchema)
  .min(1)
  .refine((entries) => new Set(entries.map((e) => e.name)).size === entries.length, {
    message: 'profile names must be unique',
  });

export function parseLadder(input: unknown): ConversionProfile {
  return Object.freeze(ladderSchema.parse(input));
}

export async function loadLadderFile(filePath: string): Promise<ConversionProfile> {
  const raw = await fs.readFile(filePath, 'utf-8');
  return parseLadder(JSON.parse(raw));
}

// Never upscale: a 200px source encoded at 320px only costs bytes.
export function clampLadder(ladder: ConversionProfile, sourceWidth?: number): ConversionProfile {
  if (!sourceWidth || sourceWidth <= 0) return ladder;
  return Object.freeze(
    ladder.map((profile) =>
      profile.width > sourceWidth ? { ...profile, width: Math.max(16, Math.floor(sourceWidth)) } : profile,
    ),
  );
}
