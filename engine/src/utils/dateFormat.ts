/**
 * Minimal date formatting with the tokens workflow authors use:
 * yyyy, yy, MM, dd, HH, mm, ss, fff, plus 'O' for ISO-8601.
 * Anything between single quotes is copied literally.
 */

const TOKEN_PATTERN = /'[^']*'|yyyy|yy|MM|dd|HH|mm|ss|fff/g;

export interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

export function formatDate(date: Date, format: string, utc: boolean = true): string {
  if (format === 'O' || format === 'o') {
    return date.toISOString();
  }
  return formatParts(toParts(date, utc), format);
}

export function formatParts(parts: DateParts, format: string): string {
  return format.replace(TOKEN_PATTERN, (token) => {
    switch (token) {
      case 'yyyy':
        return pad(parts.year, 4);
      case 'yy':
        return pad(parts.year % 100, 2);
      case 'MM':
        return pad(parts.month, 2);
      case 'dd':
        return pad(parts.day, 2);
      case 'HH':
        return pad(parts.hour, 2);
      case 'mm':
        return pad(parts.minute, 2);
      case 'ss':
        return pad(parts.second, 2);
      case 'fff':
        return pad(parts.millisecond, 3);
      default:
        return token.slice(1, -1);
    }
  });
}

export function toParts(date: Date, utc: boolean = true): DateParts {
  return utc
    ? {
        year: date.getUTCFullYear(),
        month: date.getUTCMonth() + 1,
        day: date.getUTCDate(),
        hour: date.getUTCHours(),
        minute: date.getUTCMinutes(),
        second: date.getUTCSeconds(),
        millisecond: date.getUTCMilliseconds(),
      }
    : {
        year: date.getFullYear(),
        month: date.getMonth() + 1,
        day: date.getDate(),
        hour: date.getHours(),
        minute: date.getMinutes(),
        second: date.getSeconds(),
        millisecond: date.getMilliseconds(),
      };
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}
