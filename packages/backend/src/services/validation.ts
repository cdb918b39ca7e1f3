import { sortUnique } from '@switchyard/domain';
import { BlankItemError, InvalidUrlSchemeError, MissingItemError } from '../httpError.js';

export const requireText = (value: string, field: string): string => {
  const trimmed = value.trim();

  if (!trimmed) {
    throw new BlankItemError(field);
  }

  return trimmed;
};

/** Trims, drops blanks, sorts and deduplicates a list of names. */
export const normalizeNames = (values: readonly string[]): string[] =>
  sortUnique(values.map((value) => value.trim()).filter((value) => value.length > 0));

export const normalizeIds = (values: readonly number[]): number[] => sortUnique(values);

export const requireItems = <T>(values: T[], item: string): T[] => {
  if (values.length === 0) {
    throw new MissingItemError(item);
  }

  return values;
};

export const requireHttpUrl = (value: string): string => {
  const trimmed = value.trim();
  let protocol: string;

  try {
    protocol = new URL(trimmed).protocol;
  } catch {
    throw new InvalidUrlSchemeError();
  }

  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new InvalidUrlSchemeError();
  }

  return trimmed;
};
