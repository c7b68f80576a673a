import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '@profile-pulse/shared';
import { defaultConfigDir, isMissingFile } from './config.js';

export interface Credentials {
  accessToken: string;
  igUserId: string;
  apiVersion?: string;
}

export type CredentialSource = 'environment' | 'file';

export interface ResolvedCredentials {
  credentials: Credentials;
  source: CredentialSource;
}

const credentialsSchema = z.object({
  accessToken: z.string().min(1),
  igUserId: z.string().min(1),
  apiVersion: z.string().optional(),
});

export function maskToken(token: string): string {
  if (token.length <= 8) {
    return '****';
  }
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}

/**
 * Graph API credentials, from IG_ACCESS_TOKEN / IG_USER_ID or a credentials file
 * written by `auth login`.
 */
export class CredentialStore {
  private credentialsPath: string;

  constructor(configDir: string = defaultConfigDir()) {
    this.credentialsPath = path.join(configDir, 'credentials.json');
  }

  get path(): string {
    return this.credentialsPath;
  }

  async save(credentials: Credentials): Promise<void> {
    const parsed = credentialsSchema.safeParse(credentials);
    if (!parsed.success) {
      throw new ConfigurationError('Access token and Instagram user id are required');
    }

    await fs.mkdir(path.dirname(this.credentialsPath), { recursive: true });
    await fs.writeFile(this.credentialsPath, JSON.stringify(parsed.data, null, 2), { mode: 0o600 });
  }

  async load(): Promise<Credentials | undefined> {
    let data: string;
    try {
      data = await fs.readFile(this.credentialsPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      throw new ConfigurationError(`${this.credentialsPath} is not valid JSON`);
    }

    const parsed = credentialsSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError(`${this.credentialsPath} is missing the access token or user id`);
    }
    return parsed.data;
  }

  async resolve(env: NodeJS.ProcessEnv = process.env): Promise<ResolvedCredentials | undefined> {
    const accessToken = env.IG_ACCESS_TOKEN?.trim();
    const igUserId = env.IG_USER_ID?.trim();
    if (accessToken && igUserId) {
      return {
        credentials: { accessToken, igUserId, apiVersion: env.IG_API_VERSION?.trim() || undefined },
        source: 'environment',
      };
    }

    const stored = await this.load();
    return stored ? { credentials: stored, source: 'file' } : undefined;
  }

  /** Returns false when no credentials file existed. */
  async clear(): Promise<boolean> {
    try {
      await fs.unlink(this.credentialsPath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }
}

export const credentialStore = new CredentialStore();
