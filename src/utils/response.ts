import { z } from 'zod';

export type PageMeta = {
  page: number;
  perPage: number;
  total: number;
  totalPages: number;
};

export type ErrorBody = {
  code: string;
  message: string;
  details?: unknown;
};

export type Envelope<T> = {
  success: boolean;
  message?: string;
  data?: T;
  error?: ErrorBody;
  meta?: PageMeta;
};

export const PaginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  perPage: z.coerce.number().int().min(1).max(100).default(20),
});

export type PaginationQuery = z.infer<typeof PaginationQuerySchema>;

export const toOffset = ({ page, perPage }: PaginationQuery) => ({ offset: (page - 1) * perPage, limit: perPage });

export const pageMeta = ({ page, perPage }: PaginationQuery, total: number): PageMeta => ({
  page,
  perPage,
  total,
  totalPages: total === 0 ? 0 : Math.ceil(total / perPage),
});

export const ok = <T>(data: T, message?: string): Envelope<T> => ({
  success: true,
  ...(message ? { message } : {}),
  data,
});

export const paged = <T>(items: T[], pagination: PaginationQuery, total: number): Envelope<T[]> => ({
  success: true,
  data: items,
  meta: pageMeta(pagination, total),
});

export const failure = (code: string, message: string, details?: unknown): Envelope<never> => ({
  success: false,
  error: details === undefined ? { code, message } : { code, message, details },
});
