import { ValueTransformer } from 'typeorm';

/**
 * Postgres hands back `bigint` columns as strings; keep them as numbers in
 * the entity. GitHub ids and epoch milliseconds both fit in a double.
 */
export const bigintNumberTransformer: ValueTransformer = {
  to: (value: number | null | undefined): number | null | undefined => value,
  from: (value: string | number | null | undefined): number | null | undefined => {
    if (value === null || value === undefined) {
      return value;
    }
    return typeof value === 'number' ? value : Number(value);
  },
};

/**
 * Stores an optional `Date` as epoch milliseconds in a `bigint` column.
 */
export const epochMillisTransformer: ValueTransformer = {
  to: (value: Date | null | undefined): number | null | undefined => {
    if (value === null || value === undefined) {
      return value;
    }
    return value.getTime();
  },
  from: (value: string | number | null | undefined): Date | null => {
    if (value === null || value === undefined) {
      return null;
    }
    return new Date(Number(value));
  },
};
