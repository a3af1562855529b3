/**
 * Unit tests for the shared scope-overlay behavior of environment stores
 */

import { describe, it, expect } from 'vitest';
import {
  ProfileEnvironmentStore,
  RegistryEnvironmentStore,
  createEnvironmentStore,
  joinPathLists,
} from '../../../src/environment/index.js';
import { EnvironmentErrorCode, ValidationError } from '../../../src/types/errors.js';
import { MemoryEnvironmentStore, createFakeRunner } from '../../helpers/index.js';

describe('joinPathLists', () => {
  it('joins lists and drops empty segments', () => {
    expect(joinPathLists(['/a::/b', undefined, '', '/c:'], ':')).toBe('/a:/b:/c');
  });

  it('honors the delimiter', () => {
    expect(joinPathLists(['C:\\jdk\\bin;', 'C:\\spark\\bin'], ';')).toBe('C:\\jdk\\bin;C:\\spark\\bin');
  });
});

describe('ScopedEnvironmentStore', () => {
  describe('read', () => {
    it('prefers the process view', async () => {
      const store = new MemoryEnvironmentStore({ JAVA_HOME: '/process/jdk' });
      store.scopes.machine.set('JAVA_HOME', '/machine/jdk');

      expect(await store.read('JAVA_HOME')).toEqual({ ok: true, value: '/process/jdk' });
    });

    it('falls back to the machine scope, then the user scope', async () => {
      const store = new MemoryEnvironmentStore();
      store.scopes.machine.set('JAVA_HOME', '/machine/jdk');
      store.scopes.user.set('JAVA_HOME', '/user/jdk');
      store.scopes.user.set('SPARK_HOME', '/user/spark');

      expect(await store.read('JAVA_HOME')).toEqual({ ok: true, value: '/machine/jdk' });
      expect(await store.read('SPARK_HOME')).toEqual({ ok: true, value: '/user/spark' });
    });

    it('treats empty values as absent', async () => {
      const store = new MemoryEnvironmentStore({ HADOOP_HOME: '' });
      store.scopes.machine.set('HADOOP_HOME', '');

      expect(await store.read('HADOOP_HOME')).toEqual({ ok: true, value: null });
    });

    it('propagates read failures', async () => {
      const store = new MemoryEnvironmentStore();
      store.failReads = true;

      const result = await store.read('JAVA_HOME');

      expect(!result.ok && result.error.code).toBe(EnvironmentErrorCode.READ_FAILED);
    });
  });

  describe('write', () => {
    it('persists without touching the process view', async () => {
      const env = {};
      const store = new MemoryEnvironmentStore(env);

      await store.write('SPARK_HOME', '/opt/spark', 'user');

      expect(store.scopes.user.get('SPARK_HOME')).toBe('/opt/spark');
      expect(store.view()).toBe(env);
      expect(store.view()['SPARK_HOME']).toBeUndefined();
    });

    it('refuses an empty value', async () => {
      const store = new MemoryEnvironmentStore();

      await expect(store.write('SPARK_HOME', '', 'machine')).rejects.toThrow(ValidationError);
      expect(store.writes).toEqual([]);
    });
  });

  describe('refreshProcessView', () => {
    it('overlays machine then user values and rebuilds PATH', async () => {
      const store = new MemoryEnvironmentStore({ PATH: '/stale/bin', HOME: '/home/dev', JAVA_HOME: '/old/jdk' });
      store.scopes.machine.set('JAVA_HOME', '/opt/jdk');
      store.scopes.machine.set('PATH', '/usr/bin:/opt/jdk/bin');
      store.scopes.user.set('JAVA_HOME', '/home/dev/jdk');
      store.scopes.user.set('PATH', '/home/dev/bin');

      const result = await store.refreshProcessView();

      expect(result.ok).toBe(true);
      expect(store.view()).toEqual({
        PATH: '/usr/bin:/opt/jdk/bin:/home/dev/bin',
        HOME: '/home/dev',
        JAVA_HOME: '/home/dev/jdk',
      });
    });

    it('keeps the inherited PATH when no scope defines one', async () => {
      const store = new MemoryEnvironmentStore({ PATH: '/usr/bin' });
      store.scopes.user.set('SPARK_HOME', '/opt/spark');

      await store.refreshProcessView();

      expect(store.view()).toEqual({ PATH: '/usr/bin', SPARK_HOME: '/opt/spark' });
    });

    it('leaves the view untouched when a scope cannot be read', async () => {
      const store = new MemoryEnvironmentStore({ PATH: '/usr/bin' });
      store.scopes.machine.set('JAVA_HOME', '/opt/jdk');
      store.failReads = true;

      const result = await store.refreshProcessView();

      expect(result.ok).toBe(false);
      expect(store.view()).toEqual({ PATH: '/usr/bin' });
    });
  });
});

describe('createEnvironmentStore', () => {
  it('uses the registry on Windows and profile scripts elsewhere', () => {
    const fake = createFakeRunner();

    expect(createEnvironmentStore({ platform: 'win32', runner: fake.runner, env: {} })).toBeInstanceOf(
      RegistryEnvironmentStore
    );
    expect(createEnvironmentStore({ platform: 'linux', runner: fake.runner, env: {} })).toBeInstanceOf(
      ProfileEnvironmentStore
    );
    expect(createEnvironmentStore({ platform: 'darwin', runner: fake.runner, env: {} })).toBeInstanceOf(
      ProfileEnvironmentStore
    );
  });
});
