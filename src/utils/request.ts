import { Request } from 'express';

/**
 * Typed readers for request input that has already passed validation
 */

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const queryString = (req: Request, name: string): string | undefined => {
  const value = req.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
};

export const queryInt = (req: Request, name: string): number | undefined => {
  const value = queryString(req, name);
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
};

export const bodyOf = (req: Request): Record<string, unknown> => {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
};

export const stringField = (body: Record<string, unknown>, name: string): string | undefined => {
  const value = body[name];
  return typeof value === 'string' ? value : undefined;
};

export const intField = (body: Record<string, unknown>, name: string): number | undefined => {
  const value = body[name];
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number.parseInt(value, 10);
  return undefined;
};

export const booleanField = (body: Record<string, unknown>, name: string): boolean | undefined => {
  const value = body[name];
  return typeof value === 'boolean' ? value : undefined;
};

export const dateField = (body: Record<string, unknown>, name: string): Date | null => {
  const value = stringField(body, name);
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

export const isEnumValue = <E extends Record<string, string>>(enumObject: E, value: unknown): value is E[keyof E] =>
  typeof value === 'string' && Object.values(enumObject).includes(value);
