import { promises as fs } from 'fs';
import { z } from 'zod';

export const TRANSCRIPTION_PROVIDERS = ['assemblyai', 'mock'] as const;
export type TranscriptionProvider = (typeof TRANSCRIPTION_PROVIDERS)[number];

/**
 * Settings for a single CLI run, read from the environment.
 */
export interface RunSettings {
  provider: TranscriptionProvider;
  apiKeyFile: string;
  configFile: string;
  pollIntervalMs: number;
}

const transcriptionOptionsSchema = z.object({
  language_code: z.string().min(1),
  speech_models: z.array(z.string().min(1)).nonempty(),
  speaker_labels: z.boolean().default(true),
});

export type TranscriptionOptions = z.infer<typeof transcriptionOptionsSchema>;

const fileExists = async (path: string) => {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
};

export const loadRunSettings = (env: NodeJS.ProcessEnv = process.env): RunSettings => {
  const provider = env.TRANSCRIPTION_PROVIDER || 'assemblyai';
  const isKnownProvider = (value: string): value is TranscriptionProvider =>
    TRANSCRIPTION_PROVIDERS.some((known) => known === value);
  if (!isKnownProvider(provider)) {
    throw new Error(
      `Unknown TRANSCRIPTION_PROVIDER "${provider}" (expected one of: ${TRANSCRIPTION_PROVIDERS.join(', ')}).`
    );
  }

  const pollIntervalMs = Number(env.TRANSCRIPTION_POLL_INTERVAL_MS || '3000');
  if (!Number.isInteger(pollIntervalMs) || pollIntervalMs <= 0) {
    throw new Error(
      `TRANSCRIPTION_POLL_INTERVAL_MS must be a positive integer, got "${env.TRANSCRIPTION_POLL_INTERVAL_MS}".`
    );
  }

  return {
    provider,
    apiKeyFile: env.ASSEMBLYAI_API_KEY_FILE || 'aai_api_key.txt',
    configFile: env.TRANSCRIPTION_CONFIG || 'config.json',
    pollIntervalMs,
  };
};

/**
 * Reads the AssemblyAI API key from a file holding it on a single line.
 */
export const loadApiKey = async (path: string): Promise<string> => {
  if (!(await fileExists(path))) {
    throw new Error(
      `API key file not found: ${path}. Create this file and put your AssemblyAI API key on a single line.`
    );
  }

  const key = (await fs.readFile(path, 'utf-8')).trim();
  if (!key) {
    throw new Error(`API key file ${path} is empty.`);
  }
  return key;
};

/**
 * Reads language and model settings from the transcription config file.
 */
export const loadTranscriptionOptions = async (
  path: string
): Promise<TranscriptionOptions> => {
  if (!(await fileExists(path))) {
    throw new Error(`Config file not found: ${path}`);
  }

  const raw = await fs.readFile(path, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${path} is not valid JSON: ${reason}`);
  }

  const result = transcriptionOptionsSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new Error(`${path}: invalid '${key}': ${issue.message}`);
  }
  return result.data;
};
