import AdmZip from "adm-zip";

export const AIRPORT_BASE_CSV_FILENAME = "APT_BASE.csv";

export class NasrArchiveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NasrArchiveError";
  }
}

const openArchive = (archive: Buffer): AdmZip => new AdmZip(archive);

/**
 * A failed or missing cycle is often served as an HTML page with a 200
 * status, so the bytes have to be checked before anything trusts them.
 */
export const isValidZipArchive = (archive: Buffer): boolean => {
  if (!archive.length) {
    return false;
  }

  try {
    openArchive(archive).getEntries();
    return true;
  } catch {
    return false;
  }
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const extractAirportBaseCsv = (archive: Buffer): string => {
  let entries: AdmZip.IZipEntry[];
  try {
    entries = openArchive(archive).getEntries();
  } catch (error) {
    throw new NasrArchiveError("NASR archive could not be opened as a ZIP file.", {
      cause: error
    });
  }

  const expectedName = AIRPORT_BASE_CSV_FILENAME.toLowerCase();
  const entry = entries.find(
    (candidate) => !candidate.isDirectory && candidate.name.toLowerCase() === expectedName
  );

  if (!entry) {
    throw new NasrArchiveError(`${AIRPORT_BASE_CSV_FILENAME} not found in NASR archive.`);
  }

  try {
    return entry.getData().toString("utf8");
  } catch (error) {
    throw new NasrArchiveError(
      `${AIRPORT_BASE_CSV_FILENAME} could not be read from NASR archive: ${describeError(error)}`,
      { cause: error }
    );
  }
};
