import { ServerSettings } from './configTypes.js';

export const ConfigEvents = {
    CONFIG_ERROR: 'configError',
    SETTINGS_UPDATED: 'settingsUpdated',
} as const;

export interface SettingsUpdatedPayload {
    newSettings: ServerSettings;
    oldSettings: ServerSettings;
}
