export { formatDateByDMMMYYYY } from './date';
export { calculateReadingTime } from './readingTime';
export { mapBlogToRow, mapBlogToCacheRow, mapRowToBlog } from './blogMapper';
export type { BlogRow, CachedBlogRow } from './blogMapper';
