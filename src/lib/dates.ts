// Offsets for the zone abbreviations feeds actually use.
const ZONE_OFFSETS: Record<string, string> = {
  PST: "-0800",
  PDT: "-0700",
  MST: "-0700",
  MDT: "-0600",
  CST: "-0600",
  CDT: "-0500",
  EST: "-0500",
  EDT: "-0400",
  GMT: "+0000",
  UT: "+0000",
  UTC: "+0000",
};

// ISO date-time without an offset; read as UTC.
const ISO_NO_ZONE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
// "01 Jan 2024 10:00:00", no zone.
const DD_MON_YYYY = /^(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})\s+(\d{2}):(\d{2}):(\d{2})$/;

// Has a clock time but ends without "Z", an offset or a zone name.
const HAS_TIME = /\d{1,2}:\d{2}/;
const HAS_ZONE = /(?:Z|[+-]\d{2}:?\d{2}|\b(?!AM$|PM$)[A-Z]{1,5})$/;

function valid(d: Date): Date | null {
  return isNaN(d.getTime()) ? null : d;
}

/**
 * Parses the date formats seen in RSS and Atom feeds.
 * Returns null for empty or unparseable input; never throws.
 */
export function parseFeedDate(value: string | null | undefined): Date | null {
  const trimmed = (value ?? "").trim();
  if (!trimmed) return null;

  if (ISO_NO_ZONE.test(trimmed)) {
    return valid(new Date(`${trimmed.replace(" ", "T")}Z`));
  }

  const m = trimmed.match(DD_MON_YYYY);
  if (m) {
    return valid(new Date(`${m[2]} ${m[1]}, ${m[3]} ${m[4]}:${m[5]}:${m[6]} GMT`));
  }

  // new Date() would read a zone-less time in the host's zone
  if (HAS_TIME.test(trimmed) && !HAS_ZONE.test(trimmed)) {
    const utc = valid(new Date(`${trimmed} UTC`));
    if (utc) return utc;
  }

  const native = valid(new Date(trimmed));
  if (native) return native;

  const zone = trimmed.match(/\b([A-Z]{2,4})$/);
  if (zone && ZONE_OFFSETS[zone[1]]) {
    return valid(new Date(trimmed.slice(0, zone.index) + ZONE_OFFSETS[zone[1]]));
  }
  return null;
}

/** ISO string for the wire, or null. */
export function formatIso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

/** "just now", "5 min ago", "3 h ago", "2 d ago". */
export function formatRelative(value: Date | null, now: Date): string {
  if (!value) return "unknown time";
  const seconds = Math.round((now.getTime() - value.getTime()) / 1000);
  if (seconds < 60) return "just now";
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes} min ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours} h ago`;
  return `${Math.floor(hours / 24)} d ago`;
}
