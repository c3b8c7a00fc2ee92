const pad2 = (value: number): string => String(value).padStart(2, '0');

/** Local calendar month, YYYY-MM */
export function formatMonth(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}`;
}

/** Local calendar day, YYYY-MM-DD */
export function formatDate(date: Date): string {
  return `${formatMonth(date)}-${pad2(date.getDate())}`;
}
