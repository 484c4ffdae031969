import fs from 'fs';
import os from 'os';
import path from 'path';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { buildProgram } from './index';
import { DEFAULT_CONFIG, loadJobConfig } from './utils/config';

describe('rolling-signal CLI', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rolling-signal-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should require the four paths on the run command', () => {
    const runCommand = buildProgram().commands.find(command => command.name() === 'run');

    expect(runCommand).toBeDefined();
    const mandatory = runCommand?.options.filter(option => option.mandatory) ?? [];
    expect(mandatory.map(option => option.long)).toEqual([
      '--input',
      '--config',
      '--output',
      '--log-file',
    ]);
    expect(mandatory.map(option => option.envVar)).toEqual([
      'SIGNAL_INPUT',
      'SIGNAL_CONFIG',
      'SIGNAL_OUTPUT',
      'SIGNAL_LOG_FILE',
    ]);
  });

  it('should run the job as the default command', async () => {
    const input = path.join(tempDir, 'data.csv');
    const config = path.join(tempDir, 'config.yaml');
    const output = path.join(tempDir, 'metrics.json');
    const logFile = path.join(tempDir, 'run.log');
    fs.writeFileSync(input, 'close\n1\n2\n3\n4\n5\n');
    fs.writeFileSync(config, 'seed: 42\nwindow: 3\nversion: v1\n');

    await buildProgram().parseAsync([
      'node',
      'rolling-signal',
      '--input',
      input,
      '--config',
      config,
      '--output',
      output,
      '--log-file',
      logFile,
    ]);

    expect(process.exitCode).toBe(0);
    expect(JSON.parse(fs.readFileSync(output, 'utf8'))).toMatchObject({
      rows_processed: 3,
      value: 1,
      status: 'success',
    });
  });

  it('should set a failing exit code when the job fails', async () => {
    const output = path.join(tempDir, 'metrics.json');

    await buildProgram().parseAsync([
      'node',
      'rolling-signal',
      'run',
      '--input',
      path.join(tempDir, 'missing.csv'),
      '--config',
      path.join(tempDir, 'missing.yaml'),
      '--output',
      output,
      '--log-file',
      path.join(tempDir, 'run.log'),
    ]);

    expect(process.exitCode).toBe(1);
    expect(JSON.parse(fs.readFileSync(output, 'utf8'))).toMatchObject({ status: 'error' });
  });

  it('should create a default config with init', async () => {
    const configPath = path.join(tempDir, 'config.yaml');

    await buildProgram().parseAsync(['node', 'rolling-signal', 'init', configPath]);

    expect(loadJobConfig(configPath)).toEqual(DEFAULT_CONFIG);
    expect(console.log).toHaveBeenCalledWith(`Created default configuration file: ${configPath}`);
  });
});
