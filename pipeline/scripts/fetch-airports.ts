/**
 * Pipeline: fetch the FAA NASR airport release and publish airports.json.
 *
 * Plain fetch, no browser. Tries the upcoming 28-day cycle first and falls
 * back to the one in effect.
 * Produces: web/public/airports.json and web/public/airports-meta.json
 */
import { NasrArchiveDownloader } from "../services/nasr-archive-downloader.js";
import { runAirportUpdate } from "../services/airport-update-pipeline.js";
import { parseCycleDate } from "../services/nasr-cycle.js";
import {
  AIRPORTS_METADATA_OUTPUT_PATH,
  AIRPORTS_OUTPUT_PATH,
  NASR_BASE_URL,
  NASR_CYCLE_DATE,
  NASR_DOWNLOAD_TIMEOUT_MS
} from "./pipeline-config.js";

const main = async () => {
  const startTime = Date.now();
  console.log("=== Pipeline: Fetch NASR Airports ===\n");

  const downloader = new NasrArchiveDownloader({
    baseUrl: NASR_BASE_URL,
    timeoutMs: NASR_DOWNLOAD_TIMEOUT_MS
  });

  console.log("[fetch-airports] Calculating NASR cycle dates...");
  const metadata = await runAirportUpdate({
    downloader,
    now: new Date(),
    cycleDate: NASR_CYCLE_DATE ? parseCycleDate(NASR_CYCLE_DATE) : undefined,
    outputPath: AIRPORTS_OUTPUT_PATH,
    metadataPath: AIRPORTS_METADATA_OUTPUT_PATH
  });

  const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\n✓ Fetch-airports complete (${elapsedSeconds}s)`);
  console.log(`  Cycle: ${metadata.cycleDate}${metadata.usedFallbackCycle ? " (fallback)" : ""}`);
  console.log(`  Airports: ${metadata.airportCount}`);

  if (metadata.warnings.length) {
    console.log(`  Warnings: ${metadata.warnings.length}`);
    for (const warning of metadata.warnings) {
      console.log(`    ⚠ ${warning}`);
    }
  }
};

main().catch((error) => {
  console.error("Fatal error in fetch-airports:");
  console.error(error);
  process.exit(1);
});
