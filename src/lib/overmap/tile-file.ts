/**
 * Read overmap tile save files.
 *
 * Save files are JSON, optionally preceded by a single `#` comment line
 * carrying the save version.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { LEVEL_COUNT } from './overmap-tile.js';

const RunSchema = z.tuple([z.string(), z.number().int().nonnegative()]);

const LayerSchema = z.array(RunSchema);

export const TileFileSchema = z
  .object({
    layers: z.array(LayerSchema).length(LEVEL_COUNT),
  })
  .passthrough();

export type LayerRun = z.infer<typeof RunSchema>;
export type Layer = z.infer<typeof LayerSchema>;
export type TileFile = z.infer<typeof TileFileSchema>;

export class TileFileError extends Error {
  constructor(
    public readonly file: string,
    message: string
  ) {
    super(`${file}: ${message}`);
    this.name = 'TileFileError';
  }
}

/**
 * Drop the leading comment line, if there is one.
 */
export function stripCommentLine(text: string): string {
  if (!text.startsWith('#')) {
    return text;
  }
  const newline = text.indexOf('\n');
  return newline === -1 ? '' : text.slice(newline + 1);
}

/**
 * Parse and validate the contents of a tile file.
 *
 * @param text - File contents
 * @param file - Name used in error messages
 * @throws TileFileError if the text is not JSON or has no valid `layers`
 */
export function parseTileFile(text: string, file = '<tile>'): TileFile {
  let json: unknown;
  try {
    json = JSON.parse(stripCommentLine(text));
  } catch (error) {
    throw new TileFileError(file, `invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = TileFileSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new TileFileError(file, `${where}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Read and parse a tile file from disk.
 */
export function readTileFile(path: string): TileFile {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new TileFileError(path, `cannot read file: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseTileFile(text, path);
}
