import { ValidationError } from './errors';

/**
 * Typed reads from `matchedData(req)`. Validation chains have already run, so
 * a missing or mistyped value here means the route lacks a chain.
 */
export type RequestData = Record<string, unknown>;

export const optionalString = (data: RequestData, key: string): string | undefined => {
  const value = data[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
};

export const requireString = (data: RequestData, key: string): string => {
  const value = optionalString(data, key);
  if (value === undefined) {
    throw new ValidationError(`${key} is required`);
  }
  return value;
};

export const optionalNumber = (data: RequestData, key: string): number | undefined => {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
};

export const optionalEnum = <T extends string>(data: RequestData, key: string, values: readonly T[]): T | undefined => {
  const value = data[key];
  return values.find(candidate => candidate === value);
};

export const requireEnum = <T extends string>(data: RequestData, key: string, values: readonly T[]): T => {
  const value = optionalEnum(data, key, values);
  if (value === undefined) {
    throw new ValidationError(`${key} must be one of: ${values.join(', ')}`);
  }
  return value;
};
