/**
 * @fileoverview Media URL under which a target can reach a cached file.
 * @module modules/playback/mediaUrl
 */

import path from 'node:path';

export function buildMediaUrl(mediaBaseUrl: string, filePath: string): string {
    return `${mediaBaseUrl.replace(/\/+$/, '')}/${encodeURIComponent(path.basename(filePath))}`;
}
