import { randomUUID } from 'crypto';
import { basename, join } from 'path';
import {
  systemClock,
  type Clock,
  type FormatChoice,
  type PlatformTag,
  type Requester,
} from '../types/downloads.js';
import type { EngineOptions, ExtractionEngine } from '../types/engine.js';
import { fileSize, removeDirectory, removeFile, resolveOutputFile } from './artifacts.js';
import {
  AdmissionDeniedError,
  DeliveryError,
  DownloadCancelledError,
  DownloadError,
  EngineFailure,
  FileIntegrityError,
  FileTooLargeError,
  InvalidInputError,
  LOG_TEXT_LIMIT,
  exhausted,
  truncate,
} from './errors.js';
import {
  buildEngineOptions,
  buildStrategies,
  type DownloadStrategy,
  type EngineTuning,
  type StrategyName,
} from './formats.js';
import { detectPlatform, hasRecognizedScheme } from './platforms.js';
import type { QuotaLedger } from './quotaLedger.js';
import type { DownloadRecordStore } from './recordStore.js';
import { calendarDay, fileStamp } from './time.js';

export interface DownloadRequest {
  requester: Requester;
  url: string;
  format: FormatChoice;
}

export interface DeliverableFile {
  recordId: number;
  path: string;
  fileName: string;
  sizeBytes: number;
  title: string;
  platform: PlatformTag;
}

/** Hands the file to the requester; resolves once the handoff is confirmed. */
export type DeliveryHandler = (file: DeliverableFile) => Promise<void>;

export type AdmissionResult =
  | { ok: true; platform: PlatformTag }
  | { ok: false; error: AdmissionDeniedError | InvalidInputError };

interface ResolvedFile {
  path: string;
  sizeBytes: number;
  title: string;
}

export type AttemptResult =
  | { ok: true; file: ResolvedFile }
  | { ok: false; error: DownloadError; fatal: boolean };

export type DownloadOutcome =
  | {
      ok: true;
      recordId: number;
      platform: PlatformTag;
      title: string;
      fileName: string;
      sizeBytes: number;
      strategy: StrategyName;
      attempts: number;
    }
  | { ok: false; error: DownloadError };

export interface OrchestratorOptions extends EngineTuning {
  storageRoot: string;
  maxFileSizeMb: number;
  clock?: Clock;
}

interface OrchestratorDeps {
  ledger: QuotaLedger;
  records: DownloadRecordStore;
  engine: ExtractionEngine;
}

/**
 * Turns a URL into a delivered file by walking the platform's fallback chain
 * one strategy at a time. Every request gets its own scratch directory under
 * `<storageRoot>/<day>/`, removed whole when the request fails.
 */
export class DownloadOrchestrator {
  private readonly clock: Clock;
  private readonly maxFileSizeBytes: number;

  constructor(private readonly deps: OrchestratorDeps, private readonly options: OrchestratorOptions) {
    this.clock = options.clock ?? systemClock;
    this.maxFileSizeBytes = options.maxFileSizeMb * 1024 * 1024;
  }

  async admit(userId: string, url: string): Promise<AdmissionResult> {
    if (!hasRecognizedScheme(url)) {
      return { ok: false, error: new InvalidInputError() };
    }

    const decision = await this.deps.ledger.canDownload(userId);
    if (!decision.allowed) {
      return { ok: false, error: new AdmissionDeniedError(decision.reason) };
    }

    return { ok: true, platform: detectPlatform(url) };
  }

  /**
   * Aborting `signal` kills the running engine call and stops the chain
   * before the next attempt.
   */
  async run(request: DownloadRequest, deliver: DeliveryHandler, signal?: AbortSignal): Promise<DownloadOutcome> {
    const admission = await this.admit(request.requester.id, request.url);
    if (!admission.ok) {
      return { ok: false, error: admission.error };
    }

    const platform = admission.platform;
    const now = this.clock();
    const requestId = randomUUID();
    const requestDir = join(this.options.storageRoot, calendarDay(now), requestId);
    const outputTemplate = join(requestDir, `%(title).80s_${fileStamp(now)}.%(ext)s`);
    const baseOptions = buildEngineOptions(platform, request.format, outputTemplate, this.options);
    const strategies = buildStrategies(platform, request.format);

    // eslint-disable-next-line no-console
    console.log(
      `[reelgrab] download start request_id=${requestId} user_id=${request.requester.id} platform=${platform} format=${request.format} strategies=${strategies.length}`,
    );

    let lastError: DownloadError | undefined;
    for (const [index, strategy] of strategies.entries()) {
      if (signal?.aborted) {
        await removeDirectory(requestDir);
        return { ok: false, error: new DownloadCancelledError() };
      }

      const result = await this.attempt(request.url, strategy, baseOptions, signal);

      if (result.ok) {
        return this.complete(request, platform, result.file, strategy.name, index + 1, deliver);
      }

      // eslint-disable-next-line no-console
      console.warn(
        `[reelgrab] attempt ${index + 1}/${strategies.length} (${strategy.name}) failed request_id=${requestId}: ${truncate(result.error.message, LOG_TEXT_LIMIT)}`,
      );
      lastError = result.error;
      if (result.fatal) {
        await removeDirectory(requestDir);
        return { ok: false, error: result.error };
      }
    }

    await removeDirectory(requestDir);
    const error = exhausted(lastError ?? new EngineFailure('No download strategy ran'), strategies.length, this.options.maxFileSizeMb);
    // eslint-disable-next-line no-console
    console.error(
      `[reelgrab] download failed request_id=${requestId} category=${error.category}`,
    );
    return { ok: false, error };
  }

  /**
   * Runs one strategy and checks what it left on disk. Nothing is cataloged
   * here; an oversized file is deleted before the result is returned.
   */
  async attempt(
    url: string,
    strategy: DownloadStrategy,
    baseOptions: EngineOptions,
    signal?: AbortSignal,
  ): Promise<AttemptResult> {
    const options: EngineOptions = { ...baseOptions, ...strategy.patch };

    const extraction = await this.deps.engine
      .extract(url, options, signal)
      .catch((error: unknown) => new EngineFailure(error instanceof Error ? error.message : String(error)));
    if (extraction instanceof EngineFailure) {
      if (signal?.aborted) {
        return { ok: false, error: new DownloadCancelledError(), fatal: true };
      }
      return { ok: false, error: extraction, fatal: false };
    }

    const path = await resolveOutputFile(extraction.predictedFilePath);
    if (!path) {
      // eslint-disable-next-line no-console
      console.error(`[reelgrab] engine reported success but left no file predicted_file=${extraction.predictedFilePath}`);
      return { ok: false, error: new FileIntegrityError(), fatal: true };
    }

    const sizeBytes = await fileSize(path);
    if (sizeBytes > this.maxFileSizeBytes) {
      await removeFile(path);
      return { ok: false, error: new FileTooLargeError(sizeBytes, this.options.maxFileSizeMb), fatal: false };
    }

    return { ok: true, file: { path, sizeBytes, title: extraction.title } };
  }

  private async complete(
    request: DownloadRequest,
    platform: PlatformTag,
    file: ResolvedFile,
    strategy: StrategyName,
    attempts: number,
    deliver: DeliveryHandler,
  ): Promise<DownloadOutcome> {
    const fileName = basename(file.path);
    let recordId: number;
    try {
      recordId = await this.deps.records.createRecord({
        requester: request.requester,
        platform,
        url: request.url,
        filename: fileName,
        path: file.path,
      });
    } catch (error) {
      await removeFile(file.path);
      throw error;
    }

    try {
      await deliver({
        recordId,
        path: file.path,
        fileName,
        sizeBytes: file.sizeBytes,
        title: truncate(file.title, 100),
        platform,
      });
    } catch (error) {
      await removeFile(file.path);
      const cause = error instanceof Error ? error.message : String(error);
      // eslint-disable-next-line no-console
      console.error(`[reelgrab] delivery failed record_id=${recordId}: ${truncate(cause, LOG_TEXT_LIMIT)}`);
      return { ok: false, error: new DeliveryError(recordId, cause) };
    }

    try {
      await this.deps.records.markSent(recordId);
    } finally {
      await removeFile(file.path);
    }

    // eslint-disable-next-line no-console
    console.log(
      `[reelgrab] delivered record_id=${recordId} strategy=${strategy} attempts=${attempts} size_bytes=${file.sizeBytes}`,
    );

    return {
      ok: true,
      recordId,
      platform,
      title: truncate(file.title, 100),
      fileName,
      sizeBytes: file.sizeBytes,
      strategy,
      attempts,
    };
  }
}
