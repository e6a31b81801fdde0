/**
 * @fileoverview Constants for the Playback Driver module.
 * @module modules/playback/constants
 * @version 1.0.0
 */

export const PLAYBACK_CONSTANTS = {
    /** Gateway request timeout */
    GATEWAY_TIMEOUT_MS: 10_000,

    /** Delay between wake and launch when the wake is not acknowledged */
    DEFAULT_WAKE_GRACE_MS: 3_000,

    DEFAULT_PLAYER_PACKAGE: 'org.videolan.vlc',

    MEDIA_CONTENT_TYPE: 'music',
    MEDIA_MIME_TYPE: 'audio/mpeg',
} as const;

/** Entity states that mean a media player is busy. */
export const ACTIVE_MEDIA_STATES: readonly string[] = ['playing', 'buffering', 'paused'];

/** Notify messages understood by the companion app on wake-and-launch targets. */
export const DEVICE_COMMANDS = {
    SCREEN_ON: 'command_screen_on',
    ACTIVITY: 'command_activity',
    MEDIA: 'command_media',
    VIEW_INTENT: 'android.intent.action.VIEW',
} as const;

export const PLAYBACK_ERROR_MESSAGES = {
    START_FAILED: 'Failed to start playback',
    STOP_FAILED: 'Failed to stop playback',
    WAKE_FAILED: 'Wake command failed',
    INVALID_STATE: 'Gateway returned an unreadable entity state',
} as const;
