import { InvalidRequestError } from '../errors/BoosterErrors';
import { GenerationOptions } from '../interfaces/BoosterInterfaces';

export type RequestBody = Record<string, unknown>;

const isRecord = (value: unknown): value is RequestBody =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const readBody = (body: unknown): RequestBody => {
  if (body === undefined || body === null) return {};
  if (!isRecord(body)) throw new InvalidRequestError('Request body must be a JSON object');
  return body;
};

export const requireString = (body: RequestBody, field: string): string => {
  const value = body[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidRequestError(`'${field}' must be a non-empty string`);
  }
  return value;
};

export const optionalString = (body: RequestBody, field: string): string | undefined => {
  const value = body[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new InvalidRequestError(`'${field}' must be a string`);
  return value;
};

export const optionalCount = (body: RequestBody, field: string, fallback: number): number => {
  const value = body[field];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidRequestError(`'${field}' must be an integer`);
  }
  return value;
};

export const readGenerationOptions = (body: RequestBody): GenerationOptions => {
  const raw = body.seed;
  let seed: number | string | undefined;
  if (typeof raw === 'number' || typeof raw === 'string') seed = raw;
  else if (raw !== undefined) throw new InvalidRequestError("'seed' must be a number or a string");
  return { seed, requestedBy: optionalString(body, 'requestedBy') };
};
