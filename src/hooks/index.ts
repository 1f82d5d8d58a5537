export { useBlocState } from './useBlocState';
export { useBlogs } from './useBlogs';
