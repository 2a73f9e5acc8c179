/**
 * AssetUploader - Upload media to the provider's file store and wait for it
 *
 * Videos (and some images) are processed asynchronously after upload; they
 * cannot be referenced from a prompt until the provider reports ACTIVE.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { File as ProviderFile } from '@google/genai';
import { AssetProcessingError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { ModelSession } from './ModelSession.js';
import { DEFAULT_POLL_POLICY } from './types.js';
import type { Asset, AssetState, PollPolicy } from './types.js';

const log = createLogger('AssetUploader');

function toAssetState(state: string | undefined): AssetState {
  if (state === 'PROCESSING' || state === 'ACTIVE') {
    return state;
  }
  return 'FAILED';
}

function toAsset(file: ProviderFile, fallbackMimeType: string): Asset {
  if (!file.name || !file.uri) {
    throw new AssetProcessingError(
      'Provider returned a file handle without a name or URI',
      'INVALID_HANDLE',
    );
  }
  return Object.freeze({
    name: file.name,
    uri: file.uri,
    mimeType: file.mimeType ?? fallbackMimeType,
    state: toAssetState(file.state),
  });
}

export class AssetUploader {
  constructor(private readonly session: ModelSession) {}

  /**
   * Send a local file to the provider. The returned asset may still be
   * PROCESSING; pass it to awaitActive before prompting with it.
   */
  async upload(path: string, mimeType: string): Promise<Asset> {
    const { files } = this.session.client;

    let file: ProviderFile;
    try {
      file = await files.upload({ file: path, config: { mimeType } });
    } catch (error) {
      throw new AssetProcessingError(
        `Upload failed for ${path}: ${errorMessage(error)}`,
        'UPLOAD_FAILED',
        error,
      );
    }

    const asset = toAsset(file, mimeType);
    log.info(`Uploaded ${path} as ${asset.name} (${asset.state})`);
    return asset;
  }

  /**
   * Fetch the current provider state of an asset.
   */
  async refresh(asset: Asset): Promise<Asset> {
    const { files } = this.session.client;

    let file: ProviderFile;
    try {
      file = await files.get({ name: asset.name });
    } catch (error) {
      throw new AssetProcessingError(
        `Could not check status of ${asset.name}: ${errorMessage(error)}`,
        'STATUS_CHECK_FAILED',
        error,
      );
    }
    return toAsset(file, asset.mimeType);
  }

  /**
   * Poll each asset, in order, until it leaves PROCESSING. Resolves with the
   * ACTIVE assets in input order.
   *
   * Without `timeoutMs` or `signal` the wait is unbounded: a provider that
   * never finishes processing blocks the caller indefinitely.
   *
   * @throws AssetProcessingError PROCESSING_FAILED, TIMEOUT or ABORTED
   */
  async awaitActive(assets: readonly Asset[], policy: Partial<PollPolicy> = {}): Promise<Asset[]> {
    const effective: PollPolicy = { ...DEFAULT_POLL_POLICY, ...policy };
    const startedAt = Date.now();
    const ready: Asset[] = [];

    for (const asset of assets) {
      ready.push(await this.awaitOne(asset, effective, startedAt));
    }

    return ready;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async awaitOne(asset: Asset, policy: PollPolicy, startedAt: number): Promise<Asset> {
    this.throwIfAborted(asset, policy.signal);

    let current = await this.refresh(asset);
    let delay = policy.intervalMs;
    let polls = 0;

    while (current.state === 'PROCESSING') {
      let wait = delay;
      if (policy.timeoutMs !== undefined) {
        const remaining = policy.timeoutMs - (Date.now() - startedAt);
        if (remaining <= 0) {
          throw new AssetProcessingError(
            `Timed out after ${policy.timeoutMs}ms waiting for ${asset.name} to finish processing`,
            'TIMEOUT',
          );
        }
        wait = Math.min(wait, remaining);
      }

      try {
        await sleep(wait, undefined, { signal: policy.signal });
      } catch (error) {
        throw new AssetProcessingError(
          `Stopped waiting for ${asset.name}: ${errorMessage(error)}`,
          'ABORTED',
          error,
        );
      }

      polls++;
      current = await this.refresh(current);
      delay = Math.min(delay * policy.backoffFactor, policy.maxIntervalMs);
    }

    if (current.state !== 'ACTIVE') {
      throw new AssetProcessingError(`File ${current.name} failed to process`, 'PROCESSING_FAILED');
    }

    log.debug(`${current.name} is ACTIVE after ${polls} re-check(s)`);
    return current;
  }

  private throwIfAborted(asset: Asset, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new AssetProcessingError(`Stopped waiting for ${asset.name}: aborted`, 'ABORTED');
    }
  }
}
