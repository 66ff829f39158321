import { z } from 'zod';
import { DecodeError } from '../errors';
import type { Observation } from '../types';

const RAW_PREVIEW_LIMIT = 256;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export type DecodeResult =
  | { ok: true; observation: Observation }
  | { ok: false; error: DecodeError };

export type RawMessage = Buffer | string | null | undefined;

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  // setUTCFullYear keeps years 0-99 literal; Date.UTC would shift them into the 1900s.
  const candidate = new Date(0);
  candidate.setUTCFullYear(year, month - 1, day);
  return (
    candidate.getUTCFullYear() === year &&
    candidate.getUTCMonth() === month - 1 &&
    candidate.getUTCDate() === day
  );
}

const measurementSchema = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .min(1)
    .transform((value, ctx) => {
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a numeric value' });
        return z.NEVER;
      }
      return parsed;
    })
], { errorMap: () => ({ message: 'expected a numeric value' }) });

export const observationMessageSchema = z.object({
  station_id: z.string({ required_error: 'is required' }).trim().min(1, 'must not be empty'),
  date: z
    .string({ required_error: 'is required' })
    .trim()
    .refine(isCalendarDate, 'expected an ISO calendar date (YYYY-MM-DD)'),
  tmax: measurementSchema,
  tmin: measurementSchema.nullable().optional(),
  name: z.string().nullable().optional()
});

export type ObservationMessage = z.input<typeof observationMessageSchema>;

function preview(raw: string): string {
  return raw.length > RAW_PREVIEW_LIMIT ? `${raw.slice(0, RAW_PREVIEW_LIMIT)}...` : raw;
}

function fail(field: string | null, reason: string, raw: string): DecodeResult {
  return { ok: false, error: new DecodeError(field, reason, preview(raw)) };
}

/**
 * Turns a raw stream payload into a validated observation. Never throws; every
 * problem comes back as a DecodeError naming the first offending field.
 */
export function decodeObservation(raw: RawMessage): DecodeResult {
  if (raw === null || raw === undefined) {
    return fail(null, 'message has no payload', '');
  }
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    return fail(null, `payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, text);
  }
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) {
    return fail(null, 'payload is not a JSON object', text);
  }

  const parsed = observationMessageSchema.safeParse(payload);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue && issue.path.length > 0 ? String(issue.path[0]) : null;
    return fail(field, issue?.message ?? 'invalid payload', text);
  }

  const { station_id: stationId, date, tmax, tmin, name } = parsed.data;
  const trimmedName = name?.trim();
  const observation: Observation = {
    stationId,
    date,
    tmax,
    ...(tmin !== null && tmin !== undefined ? { tmin } : {}),
    ...(trimmedName ? { name: trimmedName } : {})
  };
  return { ok: true, observation };
}

export function encodeObservation(observation: Observation): string {
  const message: ObservationMessage = {
    station_id: observation.stationId,
    date: observation.date,
    tmax: observation.tmax
  };
  if (observation.tmin !== undefined) {
    message.tmin = observation.tmin;
  }
  if (observation.name !== undefined) {
    message.name = observation.name;
  }
  return JSON.stringify(message);
}
