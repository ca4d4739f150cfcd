import { ValueTransformer } from 'typeorm';

/**
 * pg returns NUMERIC columns as strings.
 */
export const numericTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null ? null : Number(value),
};
