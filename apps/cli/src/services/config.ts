import fs from 'fs/promises';
import path from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import {
  ConfigurationError,
  GovernanceConfig,
  isGovernanceKey,
  loadGovernanceConfig,
  parseGovernanceOverrides,
} from '@profile-pulse/shared';

export function defaultConfigDir(): string {
  return process.env.PROFILE_PULSE_HOME || path.join(homedir(), '.profile-pulse');
}

export interface AppConfig {
  governance: Partial<GovernanceConfig>;
  outputDir?: string;
}

const configFileSchema = z.object({
  governance: z.record(z.unknown()).default({}),
  outputDir: z.string().optional(),
});

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ConfigService {
  readonly configDir: string;
  private configPath: string;

  constructor(configDir: string = defaultConfigDir()) {
    this.configDir = configDir;
    this.configPath = path.join(configDir, 'config.json');
  }

  get path(): string {
    return this.configPath;
  }

  async load(): Promise<AppConfig> {
    let data: string;
    try {
      data = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { governance: {} };
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      throw new ConfigurationError(`${this.configPath} is not valid JSON`);
    }

    const parsed = configFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError(`${this.configPath} has an unexpected shape`);
    }

    return {
      governance: parseGovernanceOverrides(parsed.data.governance),
      outputDir: parsed.data.outputDir,
    };
  }

  async save(config: AppConfig): Promise<void> {
    await fs.mkdir(this.configDir, { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2));
  }

  /**
   * Persist one value. Keys are the governance settings plus `outputDir`.
   */
  async set(key: string, value: string): Promise<AppConfig> {
    const config = await this.load();

    if (key === 'outputDir') {
      config.outputDir = value;
    } else if (isGovernanceKey(key)) {
      const parsed = parseGovernanceOverrides({ [key]: Number(value) });
      config.governance = { ...config.governance, ...parsed };
    } else {
      throw new ConfigurationError(`Unknown configuration key: ${key}`);
    }

    await this.save(config);
    return config;
  }

  /** Returns false when there was nothing to reset. */
  async reset(): Promise<boolean> {
    try {
      await fs.unlink(this.configPath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Effective settings: explicit overrides, then this file, then the environment, then defaults.
   */
  async resolveGovernance(
    overrides: Partial<GovernanceConfig> = {},
    env: NodeJS.ProcessEnv = process.env
  ): Promise<GovernanceConfig> {
    const config = await this.load();
    return loadGovernanceConfig({ env, overrides: [config.governance, overrides] });
  }
}

export const configService = new ConfigService();
