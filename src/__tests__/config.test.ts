import os from 'os';
import path from 'path';
import { loadConfig } from '../config';

describe('loadConfig()', () => {
  test('should fall back to the home directory defaults', () => {
    const registryDirectory = path.join(os.homedir(), '.filekeeper_data');
    expect(loadConfig({})).toEqual({
      registryDirectory,
      logDirectory: path.join(registryDirectory, 'logs'),
      activityLogEnabled: true
    });
  });

  test('should honour explicit directories', () => {
    const config = loadConfig({
      FILEKEEPER_REGISTRY_DIR: ' /srv/registry ',
      FILEKEEPER_LOG_DIR: '/var/log/filekeeper'
    });
    expect(config.registryDirectory).toBe('/srv/registry');
    expect(config.logDirectory).toBe('/var/log/filekeeper');
  });

  test('should treat blank values as unset', () => {
    const config = loadConfig({ FILEKEEPER_REGISTRY_DIR: '/srv/registry', FILEKEEPER_LOG_DIR: '  ' });
    expect(config.logDirectory).toBe(path.join('/srv/registry', 'logs'));
  });

  test.each([
    ['false', false],
    [' FALSE ', false],
    ['true', true],
    ['0', true]
  ])('should read FILEKEEPER_ACTIVITY_LOG=%j as %s', (value, expected) => {
    expect(loadConfig({ FILEKEEPER_ACTIVITY_LOG: value }).activityLogEnabled).toBe(expected);
  });
});
