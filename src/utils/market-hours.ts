// US equity regular session, 9:30-16:00 America/New_York, Monday to Friday.
// Exchange holidays are not modeled.

const OPEN_MINUTE = 9 * 60 + 30;
const CLOSE_MINUTE = 16 * 60;

const easternParts = new Intl.DateTimeFormat("en-US", {
  timeZone: "America/New_York",
  weekday: "short",
  hour: "2-digit",
  minute: "2-digit",
  hourCycle: "h23",
});

export function isMarketHours(now: Date = new Date()): boolean {
  const parts = Object.fromEntries(
    easternParts.formatToParts(now).map((part) => [part.type, part.value])
  );
  if (parts.weekday === "Sat" || parts.weekday === "Sun") return false;

  const minute = Number(parts.hour) * 60 + Number(parts.minute);
  return minute >= OPEN_MINUTE && minute <= CLOSE_MINUTE;
}
