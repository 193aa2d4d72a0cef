/**
 * API key loading for the MGP API.
 * The key comes from MGP_API_KEY, or from the first line of a key file.
 */

import fs from 'fs';

export class CredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialsError';
  }
}

export interface ApiKeySource {
  env?: string;
  file: string;
}

export function readApiKey({ env, file }: ApiKeySource): string {
  if (env && env.trim()) return env.trim();

  let contents: string;
  try {
    contents = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CredentialsError(`Unable to read API key file ${file}: ${reason}`);
  }

  const [firstLine = ''] = contents.split(/\r?\n/);
  const key = firstLine.trim();
  if (!key) {
    throw new CredentialsError(`API key file ${file} is empty`);
  }
  return key;
}

export const credentialsService = {
  readApiKey,
};
