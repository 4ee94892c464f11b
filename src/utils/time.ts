export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const TIME_PATTERN = /^\d{2}:\d{2}$/;

export function toMinutes(hhmm: string): number {
  const [h, m] = hhmm.split(':').map(Number);
  return h * 60 + m;
}

export function fromMinutes(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

// rejects 2024-02-30 and friends, which Date would silently roll over
export function isValidDate(date: string): boolean {
  if (!DATE_PATTERN.test(date)) return false;
  const [y, mo, d] = date.split('-').map(Number);
  const parsed = new Date(Date.UTC(y, mo - 1, d));
  return (
    parsed.getUTCFullYear() === y &&
    parsed.getUTCMonth() === mo - 1 &&
    parsed.getUTCDate() === d
  );
}

export function isValidTime(hhmm: string): boolean {
  if (!TIME_PATTERN.test(hhmm)) return false;
  const [h, m] = hhmm.split(':').map(Number);
  return h < 24 && m < 60;
}

/** Wall-clock instant of a slot, in the process time zone. */
export function toLocalDateTime(date: string, hhmm: string): Date {
  return new Date(`${date}T${hhmm}:00`);
}

/** YYYY-MM-DD of an instant, in the process time zone. */
export function toLocalDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

export function slotTimes(openingHour: number, closingHour: number, slotMinutes: number): string[] {
  const times: string[] = [];
  for (let m = openingHour * 60; m < closingHour * 60; m += slotMinutes) {
    times.push(fromMinutes(m));
  }
  return times;
}
