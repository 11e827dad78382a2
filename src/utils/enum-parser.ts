import { z } from 'zod';
import { AppError, ErrorCode } from '../types/error.types';

/**
 * Narrow a stored string column to its closed enumeration. A value outside the
 * enumeration means the stored data is corrupt, not that the caller erred.
 */
export function parseStoredEnum<E extends z.EnumLike>(values: E, raw: string, column: string): E[keyof E] {
  const result = z.nativeEnum(values).safeParse(raw);

  if (!result.success) {
    throw new AppError(ErrorCode.INTERNAL_ERROR, `Unexpected value "${raw}" stored in ${column}`, 500, {
      column,
    });
  }

  return result.data;
}
