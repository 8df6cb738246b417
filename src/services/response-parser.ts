import { jsonrepair } from 'jsonrepair';
import { z } from 'zod';
import { logger } from '../core/logger';
import { RoutingSignal } from '../types/graph';

const routingSchema = z.union([
  z.object({ action: z.literal('retrieve') }),
  z.object({ action: z.literal('respond'), answer: z.string().trim().min(1) }),
]);

const binaryScoreSchema = z.object({
  binary_score: z.string(),
});

const binaryScoresSchema = z.union([
  z.array(z.union([binaryScoreSchema, z.string(), z.boolean()])),
  z.object({ scores: z.array(z.union([binaryScoreSchema, z.string(), z.boolean()])) }),
]);

/**
 * Parses model output that should be JSON. Tries a direct parse first, then
 * cuts out the outermost object or array and repairs it.
 */
export function parseJsonLoose(content: string): unknown {
  const trimmed = content.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    const objectStart = trimmed.indexOf('{');
    const arrayStart = trimmed.indexOf('[');
    const useArray = arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart);
    const start = useArray ? arrayStart : objectStart;
    const end = useArray ? trimmed.lastIndexOf(']') : trimmed.lastIndexOf('}');

    if (start === -1 || end === -1 || start >= end) {
      return null;
    }

    try {
      return JSON.parse(jsonrepair(trimmed.substring(start, end + 1)));
    } catch (repairError) {
      logger.debug('JSON repair failed', {
        error: repairError instanceof Error ? repairError.message : String(repairError),
        preview: trimmed.substring(0, 120),
      });
      return null;
    }
  }
}

/** `null` when the output carries no usable routing signal. */
export function parseRoutingSignal(content: string): RoutingSignal | null {
  const result = routingSchema.safeParse(parseJsonLoose(content));
  if (!result.success) return null;
  return result.data.action === 'respond'
    ? { action: 'respond', answer: result.data.answer.trim() }
    : { action: 'retrieve' };
}

function scoreToBoolean(score: string): boolean | null {
  const normalized = score.trim().toLowerCase();
  if (normalized === 'yes') return true;
  if (normalized === 'no') return false;
  return null;
}

function entryToBoolean(entry: z.infer<typeof binaryScoreSchema> | string | boolean): boolean | null {
  if (typeof entry === 'boolean') return entry;
  if (typeof entry === 'string') return scoreToBoolean(entry);
  return scoreToBoolean(entry.binary_score);
}

/** Accepts `{"binary_score": "yes"}` or a bare yes/no. */
export function parseBinaryScore(content: string): boolean | null {
  const bare = scoreToBoolean(content.replace(/[."']/g, ''));
  if (bare !== null) return bare;

  const result = binaryScoreSchema.safeParse(parseJsonLoose(content));
  return result.success ? scoreToBoolean(result.data.binary_score) : null;
}

/** One verdict per chunk, or `null` when the list is unusable or of the wrong length. */
export function parseBinaryScores(content: string, expected: number): boolean[] | null {
  const result = binaryScoresSchema.safeParse(parseJsonLoose(content));
  if (!result.success) return null;

  const entries = Array.isArray(result.data) ? result.data : result.data.scores;
  if (entries.length !== expected) return null;

  const verdicts: boolean[] = [];
  for (const entry of entries) {
    const verdict = entryToBoolean(entry);
    if (verdict === null) return null;
    verdicts.push(verdict);
  }
  return verdicts;
}
