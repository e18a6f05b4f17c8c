function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatTimestampForDir(date: Date): string {
  const ymd = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const hms = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  const ms = String(date.getMilliseconds()).padStart(3, '0');
  return `${ymd}-${hms}-${ms}`;
}
