// src/services/pagination.ts

export interface PageQuery {
  page?: unknown;
  limit?: unknown;
}

export interface PageLimits {
  defaultSize: number;
  maxSize: number;
}

export interface PageRequest {
  page: number;
  pageSize: number;
  skip: number;
  limit: number;
}

export interface PageMeta {
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export const JOB_PAGE_LIMITS: PageLimits = { defaultSize: 10, maxSize: 50 };
export const USER_PAGE_LIMITS: PageLimits = { defaultSize: 20, maxSize: 100 };

function toInt(raw: unknown): number | undefined {
  if (typeof raw === "number") return Number.isFinite(raw) ? Math.trunc(raw) : undefined;
  if (typeof raw !== "string" || !raw.trim()) return undefined;
  const n = Number(raw.trim());
  return Number.isFinite(n) ? Math.trunc(n) : undefined;
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max);
}

/**
 * Out-of-range values are clamped, unparseable ones fall back to defaults.
 */
export function resolvePage(query: PageQuery, limits: PageLimits): PageRequest {
  const pageSize = clamp(toInt(query.limit) ?? limits.defaultSize, 1, limits.maxSize);
  // skip must stay a safe integer for the driver
  const page = clamp(toInt(query.page) ?? 1, 1, Math.floor(Number.MAX_SAFE_INTEGER / pageSize));
  return { page, pageSize, skip: (page - 1) * pageSize, limit: pageSize };
}

export function toPageMeta(total: number, request: PageRequest): PageMeta {
  const totalPages = Math.ceil(total / request.pageSize);
  return {
    total,
    page: request.page,
    pageSize: request.pageSize,
    totalPages,
    hasNext: request.page < totalPages,
    hasPrev: request.page > 1,
  };
}
