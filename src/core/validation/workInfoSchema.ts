import { z } from 'zod';
import { WorkInfo, WorkState } from '../entities/WorkInfo.js';
import { ValidationError } from '../errors.js';

export const DEFAULT_MAX_PAYLOAD_BYTES = 1024 * 1024;

const dateField = (name: string) =>
  z
    .union([z.date(), z.string(), z.number()], {
      errorMap: () => ({ message: `${name} is required and must be a date` }),
    })
    .pipe(z.coerce.date());

/**
 * Shape accepted by JobManager.submit. Only startAfter is required besides the name;
 * the rest fall back to a non-retrying, immediately eligible job.
 */
export const WorkInfoSchema = z
  .object({
    name: z.string().min(1, 'name must not be empty'),
    priority: z.number().int().default(0),
    data: z.record(z.unknown()).default({}),
    state: z.literal(WorkState.CREATED).default(WorkState.CREATED),
    retryLimit: z.number().int().min(0, 'retryLimit must be >= 0').default(0),
    retryDelay: z.number().min(0, 'retryDelay must be >= 0').default(0),
    retryBackoff: z.boolean().default(false),
    startAfter: dateField('startAfter'),
    expireInSeconds: z.number().min(0, 'expireInSeconds must be >= 0').default(0),
    keepUntil: dateField('keepUntil').optional(),
    onComplete: z.boolean().default(false),
    executor: z.string().min(1).optional(),
    endpoint: z.string().min(1).optional(),
  })
  .transform((value) => ({
    ...value,
    // Default retention: one day past the earliest start
    keepUntil: value.keepUntil ?? new Date(value.startAfter.getTime() + 24 * 60 * 60 * 1000),
  }))
  .refine((value) => value.startAfter.getTime() <= value.keepUntil.getTime(), {
    message: 'startAfter must not be later than keepUntil',
    path: ['keepUntil'],
  });

export function payloadSize(data: Record<string, unknown>): number {
  return Buffer.byteLength(JSON.stringify(data), 'utf8');
}

/**
 * Validate a submission, throwing ValidationError with one line per issue
 */
export function parseWorkInfo(
  input: unknown,
  maxPayloadBytes: number = DEFAULT_MAX_PAYLOAD_BYTES
): WorkInfo {
  const parsed = WorkInfoSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`);
    throw new ValidationError(`Invalid submission: ${issues.join('; ')}`, issues);
  }

  const size = payloadSize(parsed.data.data);
  if (size > maxPayloadBytes) {
    const issue = `data: payload is ${size} bytes, limit is ${maxPayloadBytes}`;
    throw new ValidationError(`Invalid submission: ${issue}`, [issue]);
  }

  return parsed.data;
}
