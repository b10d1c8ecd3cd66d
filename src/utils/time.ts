const pad = (value: number): string => String(value).padStart(2, '0');

// Local-time stamp such as 20240131-154500, used in generated resource and file names.
export function formatTimestamp(date: Date, separator = '-'): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}${separator}${time}`;
}
