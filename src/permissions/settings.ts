import { z } from 'zod';
import { SyncSettings } from '../types/index.js';

export const syncSettingsSchema = z.object({
  enabled: z.boolean(),
  enabledCourseIds: z
    .array(z.number().int().positive())
    .transform((ids) => [...new Set(ids)].sort((a, b) => a - b)),
  reminderLeadMinutes: z.number().int().min(0).max(7 * 24 * 60),
  syncToDeviceCalendar: z.boolean(),
  deviceCalendarId: z.string().trim().min(1).nullable(),
  autoSync: z.boolean(),
  autoSyncIntervalMinutes: z.number().int().min(5, 'auto-sync interval must be at least 5 minutes'),
});

export const DEFAULT_SETTINGS: SyncSettings = {
  enabled: false,
  enabledCourseIds: [],
  reminderLeadMinutes: 60,
  syncToDeviceCalendar: false,
  deviceCalendarId: null,
  autoSync: true,
  autoSyncIntervalMinutes: 6 * 60,
};

export function parseSettings(value: unknown): SyncSettings {
  return syncSettingsSchema.parse(value);
}

export function copySettings(settings: SyncSettings): SyncSettings {
  return { ...settings, enabledCourseIds: [...settings.enabledCourseIds] };
}
