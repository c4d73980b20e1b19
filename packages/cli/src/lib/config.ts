import Conf from 'conf';
import { homedir } from 'os';
import { join } from 'path';
import { DEFAULT_BASE_URL } from '@greenhouse-source/core';

export interface SourceSettings {
  apiKey?: string;
  baseUrl: string;
}

export const SETTING_KEYS = ['apiKey', 'baseUrl'] as const;
export type SettingKey = (typeof SETTING_KEYS)[number];

let store: Conf<SourceSettings> | null = null;

// Created on first use so importing this module touches nothing on disk
function getStore(): Conf<SourceSettings> {
  if (!store) {
    store = new Conf<SourceSettings>({
      projectName: 'greenhouse-source',
      cwd: join(homedir(), '.greenhouse-source'),
      defaults: {
        baseUrl: DEFAULT_BASE_URL
      }
    });
  }
  return store;
}

export function isSettingKey(key: string): key is SettingKey {
  return (SETTING_KEYS as readonly string[]).includes(key);
}

export function getSettings(): SourceSettings {
  const config = getStore();
  return {
    apiKey: config.get('apiKey'),
    baseUrl: config.get('baseUrl')
  };
}

export function setSetting(key: SettingKey, value: string): void {
  getStore().set(key, value);
}

export function resetSettings(): void {
  getStore().clear();
}

export function settingsPath(): string {
  return getStore().path;
}
