import type { AirportsMetadata } from "../../packages/shared/src/contracts.js";
import { writeJsonFile } from "../utils/json-output.js";
import { parseAirportBaseCsv } from "./airport-csv-parser.js";
import { extractAirportBaseCsv } from "./nasr-archive.js";
import type { NasrArchiveDownloader } from "./nasr-archive-downloader.js";

export interface AirportUpdateOptions {
  downloader: Pick<NasrArchiveDownloader, "fetchCycleArchive">;
  now: Date;
  cycleDate?: Date;
  outputPath: string;
  metadataPath: string;
}

/**
 * Download → validate → extract → parse → emit. Both output files are only
 * written once every earlier step has succeeded.
 */
export const runAirportUpdate = async ({
  downloader,
  now,
  cycleDate,
  outputPath,
  metadataPath
}: AirportUpdateOptions): Promise<AirportsMetadata> => {
  const cycleArchive = await downloader.fetchCycleArchive({ now, cycleDate });
  console.log(
    `[fetch-airports] Using cycle ${cycleArchive.cycleDate} (${cycleArchive.archive.length} bytes)`
  );

  const csvText = extractAirportBaseCsv(cycleArchive.archive);
  console.log("[fetch-airports] Parsing APT_BASE.csv...");

  const parsed = parseAirportBaseCsv(csvText);
  console.log(
    `[fetch-airports] Airports: ${parsed.airports.length} (skipped rows: ${parsed.skippedRowCount})`
  );

  const metadata: AirportsMetadata = {
    cycleDate: cycleArchive.cycleDate,
    sourceUrl: cycleArchive.sourceUrl,
    usedFallbackCycle: cycleArchive.usedFallbackCycle,
    generatedAt: now.toISOString(),
    airportCount: parsed.airports.length,
    skippedRowCount: parsed.skippedRowCount,
    warnings: [...cycleArchive.warnings, ...parsed.warnings]
  };

  await writeJsonFile(outputPath, parsed.airports);
  await writeJsonFile(metadataPath, metadata);

  return metadata;
};
