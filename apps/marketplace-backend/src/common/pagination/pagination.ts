import { z } from 'zod';

export const MAX_PAGE_SIZE = 100;

/** Keeps `page * size` a safe integer offset. */
export const MAX_PAGE_INDEX = Math.floor(
  Number.MAX_SAFE_INTEGER / MAX_PAGE_SIZE,
);

export const pageQuerySchema = z.object({
  page: z.coerce
    .number()
    .int({ message: 'page must be an integer' })
    .min(0, { message: 'page must be 0 or greater' })
    .max(MAX_PAGE_INDEX, { message: `page must be at most ${MAX_PAGE_INDEX}` })
    .default(0),
  size: z.coerce
    .number()
    .int({ message: 'size must be an integer' })
    .min(1, { message: `size must be between 1 and ${MAX_PAGE_SIZE}` })
    .max(MAX_PAGE_SIZE, {
      message: `size must be between 1 and ${MAX_PAGE_SIZE}`,
    })
    .default(10),
});

export type PageRequest = z.infer<typeof pageQuerySchema>;

export type Page<T> = {
  items: T[];
  page: number;
  size: number;
  totalElements: number;
  totalPages: number;
};

export const toPage = <T>(
  items: T[],
  totalElements: number,
  request: PageRequest,
): Page<T> => ({
  items,
  page: request.page,
  size: request.size,
  totalElements,
  totalPages: Math.ceil(totalElements / request.size),
});

export const mapPage = <T, U>(page: Page<T>, map: (item: T) => U): Page<U> => ({
  ...page,
  items: page.items.map(map),
});
