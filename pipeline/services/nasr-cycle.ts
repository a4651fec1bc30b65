const MILLISECONDS_PER_DAY = 24 * 60 * 60 * 1000;

export const NASR_CYCLE_LENGTH_DAYS = 28;

/** Effective date of the cycle published as 25_Dec_2025_APT_CSV.zip. */
export const NASR_CYCLE_ANCHOR_DATE = new Date(Date.UTC(2025, 11, 25));

export const DEFAULT_NASR_BASE_URL = "https://nfdc.faa.gov/webContent/28DaySub/extra/";

const MONTH_ABBREVIATIONS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec"
] as const;

const CYCLE_LENGTH_MS = NASR_CYCLE_LENGTH_DAYS * MILLISECONDS_PER_DAY;

/**
 * First cycle effective strictly after `now`. A `now` that lands exactly on
 * an effective date resolves to the cycle after it.
 */
export const computeNextCycleDate = (now: Date): Date => {
  const daysSinceAnchor =
    (now.getTime() - NASR_CYCLE_ANCHOR_DATE.getTime()) / MILLISECONDS_PER_DAY;
  const cyclesAhead = Math.floor(daysSinceAnchor / NASR_CYCLE_LENGTH_DAYS) + 1;

  return new Date(NASR_CYCLE_ANCHOR_DATE.getTime() + cyclesAhead * CYCLE_LENGTH_MS);
};

export const getPreviousCycleDate = (cycleDate: Date): Date =>
  new Date(cycleDate.getTime() - CYCLE_LENGTH_MS);

const padTwoDigits = (value: number): string => String(value).padStart(2, "0");

export const formatCycleDateIso = (cycleDate: Date): string =>
  `${cycleDate.getUTCFullYear()}-${padTwoDigits(cycleDate.getUTCMonth() + 1)}-${padTwoDigits(
    cycleDate.getUTCDate()
  )}`;

export const parseCycleDate = (value: string): Date => {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid NASR cycle date "${value}" (expected YYYY-MM-DD).`);
  }

  const [, year, month, day] = match;
  const cycleDate = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  if (formatCycleDateIso(cycleDate) !== value.trim()) {
    throw new Error(`Invalid NASR cycle date "${value}" (no such calendar day).`);
  }

  return cycleDate;
};

export const formatCycleArchiveName = (cycleDate: Date): string => {
  const day = padTwoDigits(cycleDate.getUTCDate());
  const month = MONTH_ABBREVIATIONS[cycleDate.getUTCMonth()];
  return `${day}_${month}_${cycleDate.getUTCFullYear()}_APT_CSV.zip`;
};

export const buildCycleArchiveUrl = (baseUrl: string, cycleDate: Date): string =>
  `${baseUrl.replace(/\/+$/, "")}/${formatCycleArchiveName(cycleDate)}`;
