import { differenceInCalendarDays, getDate, getMonth, getYear, isLeapYear, parseISO, startOfDay } from 'date-fns';
import type { ContactRecord } from '../../repositories/index.js';

// 29 February falls back to 28 February in common years
function occurrenceIn(year: number, month: number, day: number): Date {
  if (month === 1 && day === 29 && !isLeapYear(new Date(year, 0, 1))) {
    return new Date(year, 1, 28);
  }
  return new Date(year, month, day);
}

/**
 * Next celebration of a `YYYY-MM-DD` birthday on or after `today`.
 */
export function nextBirthday(birthday: string, today: Date): Date {
  const born = parseISO(birthday);
  const month = getMonth(born);
  const day = getDate(born);
  const start = startOfDay(today);

  const thisYear = occurrenceIn(getYear(start), month, day);
  return thisYear < start ? occurrenceIn(getYear(start) + 1, month, day) : thisYear;
}

export function daysUntilBirthday(birthday: string, today: Date): number {
  return differenceInCalendarDays(nextBirthday(birthday, today), startOfDay(today));
}

/**
 * Contacts whose next birthday is within [today, today + days], soonest first.
 */
export function selectUpcomingBirthdays(
  contacts: ContactRecord[],
  days: number,
  today: Date,
): ContactRecord[] {
  return contacts
    .flatMap((contact) =>
      contact.birthday ? [{ contact, daysUntil: daysUntilBirthday(contact.birthday, today) }] : [],
    )
    .filter(({ daysUntil }) => daysUntil <= days)
    .sort(
      (a, b) =>
        a.daysUntil - b.daysUntil ||
        a.contact.lastName.localeCompare(b.contact.lastName) ||
        a.contact.firstName.localeCompare(b.contact.firstName),
    )
    .map(({ contact }) => contact);
}
