import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { createLogger } from '../utils/logger';

interface ConfigMap {
  [key: string]: string | undefined;
}

export class ConfigService {
  private static instance: ConfigService | undefined;
  private logger = createLogger('ConfigService');
  private config: ConfigMap = {};
  private loaded = false;

  private constructor() {}

  static getInstance(): ConfigService {
    if (!ConfigService.instance) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  // Builds a service over a fixed map, without touching env files
  static fromValues(values: ConfigMap): ConfigService {
    const service = new ConfigService();
    service.config = { ...values };
    service.loaded = true;
    return service;
  }

  load(cwd: string = process.cwd()): void {
    if (this.loaded) return;

    // Lowest priority first: .env < env.txt < .env.local < process.env
    const envFiles = ['.env', 'env.txt', '.env.local'];

    for (const filename of envFiles) {
      const envPath = path.resolve(cwd, filename);
      if (fs.existsSync(envPath)) {
        const parsed = dotenv.parse(fs.readFileSync(envPath, 'utf-8'));
        Object.assign(this.config, parsed);
        this.logger.debug(`Loaded ${filename} file`);
      }
    }

    Object.assign(this.config, process.env);
    this.loaded = true;
  }

  get(key: string, defaultValue?: string): string | undefined {
    this.load();
    const value = this.config[key];
    return value === undefined || value === '' ? defaultValue : value;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    if (value === undefined) return defaultValue;
    const num = parseFloat(value);
    return isNaN(num) ? defaultValue : num;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key);
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === 'true';
  }

  getList(key: string, defaultValue: string[]): string[] {
    const value = this.get(key);
    if (value === undefined) return defaultValue;
    return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
  }
}
