// src/lib/paginacion.ts

export type Paginacion = {
  page: number;
  limit: number;
  offset: number;
};

export type MetaPaginacion = {
  page: number;
  limit: number;
  total: number;
  total_pages: number;
  has_more: boolean;
};

function entero(raw: unknown, fallback: number): number {
  const n = typeof raw === 'string' ? parseInt(raw, 10) : typeof raw === 'number' ? raw : NaN;
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
}

/**
 * Lee page/limit de la query: page ≥ 1, limit entre 1 y `max`.
 * page se acota para que offset siga siendo un entero seguro.
 */
export function leerPaginacion(
  query: { page?: unknown; limit?: unknown },
  defaults: { limit: number; max?: number } = { limit: 20 }
): Paginacion {
  const max = defaults.max ?? 100;
  const limit = Math.min(Math.max(entero(query.limit, defaults.limit), 1), max);
  const maxPage = Math.floor(Number.MAX_SAFE_INTEGER / limit);
  const page = Math.min(Math.max(entero(query.page, 1), 1), maxPage);
  return { page, limit, offset: (page - 1) * limit };
}

export function metaPaginacion(p: Pick<Paginacion, 'page' | 'limit'>, total: number): MetaPaginacion {
  const total_pages = Math.max(Math.ceil(total / p.limit), 1);
  return {
    page: p.page,
    limit: p.limit,
    total,
    total_pages,
    has_more: p.page * p.limit < total,
  };
}
