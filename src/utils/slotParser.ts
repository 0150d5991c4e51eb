import { DAYS_OF_WEEK, DayOfWeek, TimeSlot } from '../types';

const DAY_ALIASES: Record<string, DayOfWeek> = {
  mon: 'MON', monday: 'MON',
  tue: 'TUE', tues: 'TUE', tuesday: 'TUE',
  wed: 'WED', wednesday: 'WED',
  thu: 'THU', thur: 'THU', thurs: 'THU', thursday: 'THU',
  fri: 'FRI', friday: 'FRI',
  sat: 'SAT', saturday: 'SAT',
  sun: 'SUN', sunday: 'SUN',
  // Chinese weekday characters
  '一': 'MON', '二': 'TUE', '三': 'WED', '四': 'THU', '五': 'FRI', '六': 'SAT', '日': 'SUN',
  // Korean weekday characters
  '월': 'MON', '화': 'TUE', '수': 'WED', '목': 'THU', '금': 'FRI', '토': 'SAT', '일': 'SUN',
};

/**
 * Parse a day name in any supported notation to DayOfWeek
 * Note: '日' and '일' both map to SUN
 */
export function parseDay(dayStr: string): DayOfWeek | null {
  const key = dayStr.trim().toLowerCase();
  if (!key) return null;
  return DAY_ALIASES[key] ?? null;
}

/**
 * Identity of a slot for conflict and dedupe purposes; room is ignored
 */
export function slotKey(slot: Pick<TimeSlot, 'day' | 'period'>): string {
  return `${slot.day}-${slot.period}`;
}

export function compareSlots(a: TimeSlot, b: TimeSlot): number {
  const dayDiff = DAYS_OF_WEEK.indexOf(a.day) - DAYS_OF_WEEK.indexOf(b.day);
  return dayDiff !== 0 ? dayDiff : a.period - b.period;
}

/**
 * Drop repeated (day, period) pairs, keeping the first occurrence, and order by day then period
 */
export function dedupeSlots(slots: TimeSlot[]): TimeSlot[] {
  const seen = new Set<string>();
  const unique: TimeSlot[] = [];

  for (const slot of slots) {
    const key = slotKey(slot);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(slot);
  }

  return unique.sort(compareSlots);
}

/**
 * Parse slot notation "<day> / <periods> [/ <room>]"
 * Examples:
 * - "Fri / 6,7 / B 312"
 * - "MON/1,2"
 * - "五 / 3,4"
 * Periods that are not positive integers are skipped.
 */
export function parseSlotString(slotStr: string): TimeSlot[] {
  // Full-width spaces appear in copied timetables
  const normalized = slotStr.replace(/　/g, ' ').trim();
  if (!normalized) return [];

  const parts = normalized.split('/').map((p) => p.trim());
  if (parts.length < 2) return [];

  const day = parseDay(parts[0]);
  if (!day) return [];

  const room = parts.length >= 3 && parts[2] ? parts.slice(2).join('/').trim() : undefined;
  const slots: TimeSlot[] = [];

  for (const periodStr of parts[1].split(',')) {
    const trimmed = periodStr.trim();
    if (!/^\d+$/.test(trimmed)) continue;
    const period = parseInt(trimmed, 10);
    if (period < 1) continue;
    slots.push(room ? { day, period, room } : { day, period });
  }

  return slots;
}

/**
 * Format a slot back to notation, e.g. "MON/3" or "MON/3/B 312"
 */
export function formatSlot(slot: TimeSlot): string {
  return slot.room ? `${slot.day}/${slot.period}/${slot.room}` : `${slot.day}/${slot.period}`;
}
