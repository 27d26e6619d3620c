// src/libs/time.ts
// ============================================================================
// Zeitquelle + Zeitstempel-Normalisierung
// ----------------------------------------------------------------------------
// - Clock ist injizierbar (Tests setzen feste Zeitpunkte)
// - Alle Zeitstempel, die den Kern erreichen, sind UTC-Instants (Date).
//   Naive Werte ohne Offset (z. B. aus "timestamp without time zone")
//   werden als UTC gelesen, NICHT als lokale Server-Zeit.
// ============================================================================

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;
// Offset nach der Uhrzeit: Z, +02, +0200, +02:00
const OFFSET_RE = /T[^+-]*(Z|[+-]\d{2}(:?\d{2})?)$/i;
const SHORT_OFFSET_RE = /([+-]\d{2})$/;
const COMPACT_OFFSET_RE = /([+-]\d{2})(\d{2})$/;

/**
 * Normalisiert einen Zeitstempel auf einen UTC-Instant.
 * - Date / Epoch-Millis bleiben, wie sie sind
 * - Strings ohne Offset werden als UTC interpretiert
 * - null/undefined/ungültig -> null
 */
export function toUtcInstant(value: Date | string | number | null | undefined): Date | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? new Date(value) : null;
  }

  const trimmed = value.trim();
  if (!trimmed) return null;

  let iso = DATE_ONLY_RE.test(trimmed) ? `${trimmed}T00:00:00` : trimmed.replace(" ", "T");

  if (!OFFSET_RE.test(iso)) {
    iso = `${iso}Z`;
  } else if (!/Z$/i.test(iso)) {
    // pg liefert "+00" bzw. "+0000" -> Date.parse braucht "+00:00"
    iso = COMPACT_OFFSET_RE.test(iso)
      ? iso.replace(COMPACT_OFFSET_RE, "$1:$2")
      : iso.replace(SHORT_OFFSET_RE, "$1:00");
  }

  const parsed = new Date(iso);

  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
