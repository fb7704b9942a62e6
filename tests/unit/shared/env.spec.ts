import * as path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';

import {
  ENV_VARS,
  getDefaultDbPath,
  getDefaultLogDir,
  getEnvBoolean,
  getEnvInt,
  getServerPort,
  getWorkingDirectory,
} from '../../../src/shared/config/env.js';
import { getServerReadyTimeoutMs, SERVER_READY_TIMEOUT_MS } from '../../../src/shared/config/timeouts.js';
import { InvalidConfigValueError } from '../../../src/shared/errors/index.js';

const touched = [
  ENV_VARS.CWD,
  ENV_VARS.DB_PATH,
  ENV_VARS.SERVER_PORT,
  ENV_VARS.READY_TIMEOUT_MS,
  'TREETRACE_TEST_FLAG',
];

describe('Environment configuration', () => {
  afterEach(() => {
    for (const name of touched) {
      delete process.env[name];
    }
  });

  it('parses booleans and integers', () => {
    process.env.TREETRACE_TEST_FLAG = 'Yes';
    expect(getEnvBoolean('TREETRACE_TEST_FLAG')).toBe(true);
    process.env.TREETRACE_TEST_FLAG = '0';
    expect(getEnvBoolean('TREETRACE_TEST_FLAG')).toBe(false);
    process.env.TREETRACE_TEST_FLAG = 'x';
    expect(getEnvInt('TREETRACE_TEST_FLAG', 7)).toBe(7);
  });

  it('places state under .treetrace of the working directory', () => {
    process.env[ENV_VARS.CWD] = '/srv/project';

    expect(getWorkingDirectory()).toBe('/srv/project');
    expect(getDefaultDbPath()).toBe(path.join('/srv/project', '.treetrace', 'traces.db'));
    expect(getDefaultLogDir()).toBe(path.join('/srv/project', '.treetrace', 'logs'));
  });

  it('resolves a database override against the working directory', () => {
    process.env[ENV_VARS.DB_PATH] = 'data/spans.db';

    expect(getDefaultDbPath('/srv/project')).toBe(path.resolve('/srv/project', 'data/spans.db'));
  });

  it('reads the server port', () => {
    expect(getServerPort()).toBe(0);
    process.env[ENV_VARS.SERVER_PORT] = ' 8123 ';
    expect(getServerPort()).toBe(8123);
    process.env[ENV_VARS.SERVER_PORT] = '99999';
    expect(() => getServerPort()).toThrow(InvalidConfigValueError);
    process.env[ENV_VARS.SERVER_PORT] = 'abc';
    expect(() => getServerPort()).toThrow(InvalidConfigValueError);
  });

  it('falls back to the default readiness timeout', () => {
    expect(getServerReadyTimeoutMs()).toBe(SERVER_READY_TIMEOUT_MS);
    process.env[ENV_VARS.READY_TIMEOUT_MS] = '2500';
    expect(getServerReadyTimeoutMs()).toBe(2500);
    process.env[ENV_VARS.READY_TIMEOUT_MS] = '-1';
    expect(getServerReadyTimeoutMs()).toBe(SERVER_READY_TIMEOUT_MS);
  });
});
