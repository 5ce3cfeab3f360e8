function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function parts(date: Date): { day: string; time: string[] } {
  return {
    day: `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`,
    time: [pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds())],
  };
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const { day, time } = parts(date);
  return `${day} ${time.join(":")}`;
}

/** Local time as `YYYY-MM-DD_HH-MM-SS`, safe in file names. */
export function formatFileStamp(date: Date): string {
  const { day, time } = parts(date);
  return `${day}_${time.join("-")}`;
}
