export const EPISODE_PAGE_SIZE = 5;

export interface Page<T> {
    items: T[];
    page: number;
    totalPages: number;
    totalItems: number;
    hasPrevious: boolean;
    hasNext: boolean;
}

/** Slices one page out of `items`, clamping `page` into `[1, totalPages]`. */
export function paginate<T>(items: readonly T[], page: number, pageSize: number = EPISODE_PAGE_SIZE): Page<T> {
    const totalPages = Math.max(1, Math.ceil(items.length / pageSize));
    const requested = Number.isFinite(page) ? Math.trunc(page) : 1;
    const current = Math.min(Math.max(requested, 1), totalPages);
    const start = (current - 1) * pageSize;

    return {
        items: items.slice(start, start + pageSize),
        page: current,
        totalPages,
        totalItems: items.length,
        hasPrevious: current > 1,
        hasNext: current < totalPages,
    };
}
