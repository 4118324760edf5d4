import { ValueTransformer } from 'typeorm';

/**
 * pg hands `decimal` and `bigint` columns back as strings; the entities
 * expose them as numbers.
 */
export const numericTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null || value === undefined ? null : Number(value),
};
