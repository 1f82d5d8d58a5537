const MONTH_LABELS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
];

/**
 * `d MMM, yyyy` in local time, e.g. `19 Oct, 2026`.
 */
export const formatDateByDMMMYYYY = (value: Date | string): string => {
  const date = typeof value === 'string' ? new Date(value) : value;
  if (Number.isNaN(date.getTime())) return '';
  return `${date.getDate()} ${MONTH_LABELS[date.getMonth()]}, ${date.getFullYear()}`;
};
