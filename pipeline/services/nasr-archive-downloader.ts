import { isValidZipArchive } from "./nasr-archive.js";
import {
  DEFAULT_NASR_BASE_URL,
  buildCycleArchiveUrl,
  computeNextCycleDate,
  formatCycleDateIso,
  getPreviousCycleDate
} from "./nasr-cycle.js";

export class NasrDownloadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NasrDownloadError";
  }
}

interface NasrArchiveDownloaderOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

interface NasrArchiveDownloaderConstructorOptions
  extends Partial<NasrArchiveDownloaderOptions> {
  fetchImpl?: typeof fetch;
}

const DEFAULT_OPTIONS: NasrArchiveDownloaderOptions = {
  baseUrl: DEFAULT_NASR_BASE_URL,
  timeoutMs: 120_000,
  userAgent: "fuel-near-me/1.0 (purpose: NASR airport fuel snapshot)"
};

export interface NasrCycleArchive {
  cycleDate: string;
  sourceUrl: string;
  archive: Buffer;
  usedFallbackCycle: boolean;
  warnings: string[];
}

export interface FetchCycleArchiveOptions {
  now: Date;
  /** Skip the next-cycle calculation and start from this effective date. */
  cycleDate?: Date;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class NasrArchiveDownloader {
  private readonly options: NasrArchiveDownloaderOptions;

  private readonly fetchImpl: typeof fetch;

  constructor(options?: NasrArchiveDownloaderConstructorOptions) {
    this.options = {
      baseUrl: options?.baseUrl ?? DEFAULT_OPTIONS.baseUrl,
      timeoutMs: options?.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs,
      userAgent: options?.userAgent ?? DEFAULT_OPTIONS.userAgent
    };
    this.fetchImpl = options?.fetchImpl ?? fetch;
  }

  async downloadArchive(url: string): Promise<Buffer> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "application/zip, application/octet-stream"
        },
        signal: controller.signal
      });

      if (!response.ok) {
        throw new NasrDownloadError(`HTTP ${response.status}: ${url}`);
      }

      return Buffer.from(await response.arrayBuffer());
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Downloads the upcoming cycle, which the FAA publishes ahead of its
   * effective date. When it is not up yet the cycle in effect is used instead.
   */
  async fetchCycleArchive({ now, cycleDate }: FetchCycleArchiveOptions): Promise<NasrCycleArchive> {
    const warnings: string[] = [];
    const candidateCycleDate = cycleDate ?? computeNextCycleDate(now);
    const candidateUrl = buildCycleArchiveUrl(this.options.baseUrl, candidateCycleDate);

    console.log(`[nasr] Trying cycle ${formatCycleDateIso(candidateCycleDate)}: ${candidateUrl}`);

    let candidateFailure: string;
    try {
      const archive = await this.downloadArchive(candidateUrl);
      if (isValidZipArchive(archive)) {
        return {
          cycleDate: formatCycleDateIso(candidateCycleDate),
          sourceUrl: candidateUrl,
          archive,
          usedFallbackCycle: false,
          warnings
        };
      }

      candidateFailure = "response is not a valid ZIP archive";
    } catch (error) {
      candidateFailure = describeError(error);
    }

    const fallbackCycleDate = getPreviousCycleDate(candidateCycleDate);
    const fallbackUrl = buildCycleArchiveUrl(this.options.baseUrl, fallbackCycleDate);
    const warning =
      `NASR cycle ${formatCycleDateIso(candidateCycleDate)} not available (${candidateFailure}); ` +
      `fell back to cycle ${formatCycleDateIso(fallbackCycleDate)}.`;

    console.warn(`[nasr] ⚠ ${warning}`);
    console.log(`[nasr] Current cycle URL: ${fallbackUrl}`);
    warnings.push(warning);

    let fallbackArchive: Buffer;
    try {
      fallbackArchive = await this.downloadArchive(fallbackUrl);
    } catch (error) {
      throw new NasrDownloadError(
        `Failed to download current NASR cycle ${formatCycleDateIso(fallbackCycleDate)}: ${describeError(error)}`,
        { cause: error }
      );
    }

    if (!isValidZipArchive(fallbackArchive)) {
      throw new NasrDownloadError(
        `Downloaded current NASR cycle ${formatCycleDateIso(fallbackCycleDate)} but it is not a valid ZIP archive.`
      );
    }

    return {
      cycleDate: formatCycleDateIso(fallbackCycleDate),
      sourceUrl: fallbackUrl,
      archive: fallbackArchive,
      usedFallbackCycle: true,
      warnings
    };
  }
}
