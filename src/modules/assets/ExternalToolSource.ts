/**
 * @fileoverview Audio source for video-hosting references, via an external
 * extractor (yt-dlp by default).
 * @module modules/assets/ExternalToolSource
 * @version 1.0.0
 */

import { execFile } from 'node:child_process';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { FetchError } from '../../types/app-errors';
import { ASSET_CONSTANTS, ASSET_ERROR_MESSAGES, AUDIO_EXTENSIONS } from './constants';
import type { IAudioSource } from './interfaces';

/**
 * Runs a binary to completion. Rejects on non-zero exit, timeout or abort.
 */
export type ToolRunner = (binary: string, args: string[], timeoutMs: number, signal?: AbortSignal) => Promise<void>;

export const execFileRunner: ToolRunner = (binary, args, timeoutMs, signal) =>
    new Promise<void>((resolve, reject) => {
        execFile(binary, args, { timeout: timeoutMs, ...(signal ? { signal } : {}) }, (error, _stdout, stderr) => {
            if (error) {
                const detail = stderr.trim().split('\n').pop() ?? '';
                reject(new Error(detail ? `${error.message}: ${detail}` : error.message));
                return;
            }
            resolve();
        });
    });

export interface ExternalToolSourceConfig {
    binary?: string;
    timeoutMs?: number;
    runner?: ToolRunner;
}

/**
 * Arguments for a best-audio extraction written next to `destinationPath`.
 */
export function buildExtractorArgs(reference: string, destinationPath: string): string[] {
    return [
        '--no-playlist',
        '-f', 'bestaudio/best',
        '-x',
        '--audio-format', 'mp3',
        '--audio-quality', '0',
        '--force-overwrites',
        '-o', `${destinationPath}${ASSET_CONSTANTS.PARTIAL_SUFFIX}.%(ext)s`,
        reference,
    ];
}

export class ExternalToolSource implements IAudioSource {
    private readonly _binary: string;
    private readonly _timeoutMs: number;
    private readonly _runner: ToolRunner;

    constructor(config: ExternalToolSourceConfig = {}) {
        this._binary = config.binary ?? ASSET_CONSTANTS.DEFAULT_TOOL_BINARY;
        this._timeoutMs = config.timeoutMs ?? ASSET_CONSTANTS.TOOL_TIMEOUT_MS;
        this._runner = config.runner ?? execFileRunner;
    }

    public async fetch(reference: string, destinationPath: string, signal?: AbortSignal): Promise<string> {
        try {
            await this._runner(this._binary, buildExtractorArgs(reference, destinationPath), this._timeoutMs, signal);
        } catch (error) {
            await this._removePartials(destinationPath);
            const message = error instanceof Error ? error.message : String(error);
            throw new FetchError(`${this._binary} failed: ${message}`, { reference });
        }

        const produced = await this._findOutput(destinationPath);
        if (produced === null) {
            await this._removePartials(destinationPath);
            throw new FetchError(ASSET_ERROR_MESSAGES.TOOL_NO_OUTPUT, { reference });
        }
        await fs.rename(produced, destinationPath);
        await this._removePartials(destinationPath);
        return destinationPath;
    }

    private async _partials(destinationPath: string): Promise<string[]> {
        const dir = path.dirname(destinationPath);
        const prefix = path.basename(destinationPath) + ASSET_CONSTANTS.PARTIAL_SUFFIX + '.';
        const names = await fs.readdir(dir);
        return names.filter((name) => name.startsWith(prefix)).map((name) => path.join(dir, name));
    }

    private async _findOutput(destinationPath: string): Promise<string | null> {
        const candidates = await this._partials(destinationPath);
        const audio = candidates.find((file) => AUDIO_EXTENSIONS.includes(path.extname(file).toLowerCase()));
        return audio ?? null;
    }

    private async _removePartials(destinationPath: string): Promise<void> {
        const leftovers = await this._partials(destinationPath);
        await Promise.all(leftovers.map((file) => fs.rm(file, { force: true })));
    }
}
