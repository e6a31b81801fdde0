/**
 * @fileoverview zod schemas for the configuration file and persisted settings.
 * @module config/schema
 * @version 1.0.0
 */

import { z } from 'zod';
import type { ZodIssue } from 'zod';
import { EventKind } from '../modules/timetable/types';
import { OFFSET_MINUTES_LIMIT } from '../modules/scheduler/constants';

// ============================================
// Settings
// ============================================

const labelList = z.array(z.string().min(1)).optional();

export const TimeTableSourceSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('calculation'),
        latitude: z.number().min(-90).max(90),
        longitude: z.number().min(-180).max(180),
        method: z.number().int().nonnegative(),
        school: z.union([z.literal(0), z.literal(1)]).optional(),
        baseUrl: z.string().url().optional(),
    }),
    z.object({
        type: z.literal('portal'),
        url: z.string().url(),
        labels: z
            .object({
                [EventKind.Fajr]: labelList,
                [EventKind.Sunrise]: labelList,
                [EventKind.Dhuhr]: labelList,
                [EventKind.Asr]: labelList,
                [EventKind.Maghrib]: labelList,
                [EventKind.Isha]: labelList,
            })
            .optional(),
    }),
]);

export const PlaybackBackendSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('cast'),
        entityId: z.string().min(1),
        mediaBaseUrl: z.string().url(),
    }),
    z.object({
        type: z.literal('wakeAndLaunch'),
        notifyService: z.string().min(1),
        mediaBaseUrl: z.string().url(),
        acknowledgeWake: z.boolean().default(true),
        wakeGraceMs: z.number().int().nonnegative().optional(),
        playerPackage: z.string().min(1).optional(),
    }),
]);

export const EnabledFlagsSchema = z.object({
    [EventKind.Fajr]: z.boolean().default(true),
    [EventKind.Sunrise]: z.boolean().default(false),
    [EventKind.Dhuhr]: z.boolean().default(true),
    [EventKind.Asr]: z.boolean().default(true),
    [EventKind.Maghrib]: z.boolean().default(true),
    [EventKind.Isha]: z.boolean().default(true),
});

export const SettingsSchema = z.object({
    enabled: EnabledFlagsSchema.default({}),
    offsetMinutes: z.number().int().min(-OFFSET_MINUTES_LIMIT).max(OFFSET_MINUTES_LIMIT).default(0),
    source: TimeTableSourceSchema,
    backend: PlaybackBackendSchema,
    audio: z.object({
        primary: z.string().min(1),
        fajr: z.string().min(1).nullable().default(null),
    }),
});

// ============================================
// Configuration File
// ============================================

export const ConfigSchema = z.object({
    /** Initial settings; persisted settings take precedence once saved */
    settings: SettingsSchema,
    gateway: z.object({
        baseUrl: z.string().url(),
        token: z.string().default(''),
        timeoutMs: z.number().int().positive().optional(),
    }),
    cache: z
        .object({
            dir: z.string().min(1).default('.minaret/cache'),
            toolBinary: z.string().min(1).default('yt-dlp'),
        })
        .default({}),
    stateFile: z.string().min(1).default('.minaret/state.json'),
    server: z
        .object({
            host: z.string().default('0.0.0.0'),
            port: z.number().int().min(0).max(65535).default(8080),
            token: z.string().min(1).nullable().default(null),
        })
        .default({}),
    logging: z
        .object({
            debug: z.boolean().default(false),
        })
        .default({}),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * One line per issue: `path.to.field: message`.
 */
export function formatZodIssues(issues: readonly ZodIssue[]): string {
    return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
