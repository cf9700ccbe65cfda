import Conf from 'conf';
import os from 'os';
import path from 'path';
import { AppConfig } from '../domain';

export const DEFAULT_CONFIG: AppConfig = {
  server: { ip: '127.0.0.1', port: 3000, apiKey: '' },
  paths: { output: path.join(os.homedir(), 'clinical-notes') },
  setupComplete: false,
};

class ConfigService {
  private _store: Conf<AppConfig> | null = null;

  // Created on first use so importing the CLI never touches the config file
  private get store(): Conf<AppConfig> {
    if (!this._store) {
      this._store = new Conf<AppConfig>({
        projectName: 'clinical-scribe-client',
        defaults: DEFAULT_CONFIG,
      });
    }
    return this._store;
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.store.get(key);
  }

  set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): void {
    this.store.set(key, value);
  }

  setOutputPath(value: string): void {
    this.set('paths', { ...this.get('paths'), output: path.normalize(value) });
  }

  get path(): string {
    return this.store.path;
  }

  hasConfigured(): boolean {
    return this.get('setupComplete') && !!this.get('paths').output;
  }
}

export const configService = new ConfigService();
