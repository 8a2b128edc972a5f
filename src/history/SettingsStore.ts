import * as fs from 'fs';
import * as path from 'path';

import { errorMessage } from '../core/errors';
import { ConsentMode, LogLevel } from '../types/enums';
import { Logger } from '../utils/logger/Logger';
import { isPlainObject } from '../utils/validators/config-validator';

import { DEFAULT_STATE_DIR, isNotFound } from './HistoryStore';

export interface Settings {
  consentMode: ConsentMode;
}

export const DEFAULT_SETTINGS: Settings = { consentMode: ConsentMode.ACCEPT };

/**
 * User settings in `<dir>/settings.json`
 */
export class SettingsStore {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(options: { dir?: string; logger?: Logger } = {}) {
    this.filePath = path.join(options.dir ?? DEFAULT_STATE_DIR, 'settings.json');
    this.logger = options.logger?.child('Settings') ?? new Logger(LogLevel.INFO, 'Settings');
  }

  async load(): Promise<Settings> {
    try {
      const data: unknown = JSON.parse(await fs.promises.readFile(this.filePath, 'utf-8'));
      if (!isPlainObject(data)) {
        return { ...DEFAULT_SETTINGS };
      }
      return {
        consentMode: data.consentMode === ConsentMode.HIDE_ONLY ? ConsentMode.HIDE_ONLY : ConsentMode.ACCEPT,
      };
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn(`Settings could not be loaded: ${errorMessage(error)}`);
      }
      return { ...DEFAULT_SETTINGS };
    }
  }

  async save(settings: Settings): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, JSON.stringify(settings, null, 2), 'utf-8');
    } catch (error) {
      this.logger.warn(`Settings could not be saved: ${errorMessage(error)}`);
    }
  }
}
