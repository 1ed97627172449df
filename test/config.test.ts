import { expect } from 'chai';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { loadApiKey, loadRunSettings, loadTranscriptionOptions } from '../src/config.js';

describe('config', () => {
  describe('loadRunSettings', () => {
    it('falls back to defaults', () => {
      expect(loadRunSettings({})).to.deep.equal({
        provider: 'assemblyai',
        apiKeyFile: 'aai_api_key.txt',
        configFile: 'config.json',
        pollIntervalMs: 3000,
      });
    });

    it('reads overrides from the environment', () => {
      const settings = loadRunSettings({
        TRANSCRIPTION_PROVIDER: 'mock',
        ASSEMBLYAI_API_KEY_FILE: '/etc/keys/aai.txt',
        TRANSCRIPTION_CONFIG: 'custom.json',
        TRANSCRIPTION_POLL_INTERVAL_MS: '500',
      });

      expect(settings).to.deep.equal({
        provider: 'mock',
        apiKeyFile: '/etc/keys/aai.txt',
        configFile: 'custom.json',
        pollIntervalMs: 500,
      });
    });

    it('rejects an unknown provider', () => {
      expect(() => loadRunSettings({ TRANSCRIPTION_PROVIDER: 'whisper' })).to.throw(
        'Unknown TRANSCRIPTION_PROVIDER "whisper" (expected one of: assemblyai, mock).'
      );
    });

    it('rejects a non-positive poll interval', () => {
      expect(() => loadRunSettings({ TRANSCRIPTION_POLL_INTERVAL_MS: '0' })).to.throw(
        'TRANSCRIPTION_POLL_INTERVAL_MS must be a positive integer, got "0".'
      );
    });
  });

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'transcript-config-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('reads and trims the API key', async () => {
      const file = path.join(dir, 'key.txt');
      await fs.writeFile(file, '  test-secret\n');

      expect(await loadApiKey(file)).to.equal('test-secret');
    });

    it('fails when the API key file is missing', async () => {
      const file = path.join(dir, 'missing.txt');

      const err = await loadApiKey(file).catch((e: unknown) => e);

      expect(err).to.be.instanceOf(Error);
      expect(String(err)).to.include(`API key file not found: ${file}`);
    });

    it('fails when the API key file is empty', async () => {
      const file = path.join(dir, 'key.txt');
      await fs.writeFile(file, '\n  \n');

      const err = await loadApiKey(file).catch((e: unknown) => e);

      expect(String(err)).to.equal(`Error: API key file ${file} is empty.`);
    });

    it('loads transcription options and defaults speaker labels on', async () => {
      const file = path.join(dir, 'config.json');
      await fs.writeFile(file, JSON.stringify({ language_code: 'en', speech_models: ['universal'] }));

      expect(await loadTranscriptionOptions(file)).to.deep.equal({
        language_code: 'en',
        speech_models: ['universal'],
        speaker_labels: true,
      });
    });

    it('fails when the config file is missing', async () => {
      const file = path.join(dir, 'config.json');

      const err = await loadTranscriptionOptions(file).catch((e: unknown) => e);

      expect(String(err)).to.equal(`Error: Config file not found: ${file}`);
    });

    it('fails on invalid JSON', async () => {
      const file = path.join(dir, 'config.json');
      await fs.writeFile(file, '{ "language_code": ');

      const err = await loadTranscriptionOptions(file).catch((e: unknown) => e);

      expect(String(err)).to.include(`Error: ${file} is not valid JSON: `);
    });

    it('names a missing required key', async () => {
      const file = path.join(dir, 'config.json');
      await fs.writeFile(file, JSON.stringify({ speech_models: ['best'] }));

      const err = await loadTranscriptionOptions(file).catch((e: unknown) => e);

      expect(String(err)).to.include(`invalid 'language_code'`);
    });

    it('keeps every configured model name in priority order', async () => {
      const file = path.join(dir, 'config.json');
      await fs.writeFile(
        file,
        JSON.stringify({
          language_code: 'en',
          speech_models: ['universal-3-pro', 'universal-2'],
          speaker_labels: false,
        })
      );

      expect(await loadTranscriptionOptions(file)).to.deep.equal({
        language_code: 'en',
        speech_models: ['universal-3-pro', 'universal-2'],
        speaker_labels: false,
      });
    });

    it('rejects a blank model name', async () => {
      const file = path.join(dir, 'config.json');
      await fs.writeFile(file, JSON.stringify({ language_code: 'en', speech_models: ['universal', ''] }));

      const err = await loadTranscriptionOptions(file).catch((e: unknown) => e);

      expect(String(err)).to.include(`invalid 'speech_models.1'`);
    });

    it('rejects an empty model list', async () => {
      const file = path.join(dir, 'config.json');
      await fs.writeFile(file, JSON.stringify({ language_code: 'en', speech_models: [] }));

      const err = await loadTranscriptionOptions(file).catch((e: unknown) => e);

      expect(String(err)).to.include(`invalid 'speech_models'`);
    });
  });
});
