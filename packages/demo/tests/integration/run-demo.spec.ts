/**
 * @fileoverview Scripted Demo Session Integration Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  type LogRecord,
  createServiceCollection,
  MemoryLogSink,
  ServiceLifetime,
} from '@scopelab/core';

import { configureServices, runDemo } from '../../src/app';
import { defaultConfig } from '../../src/config';
import { NotificationService2, ViewService } from '../../src/services';
import { createTestApplication } from '../helpers';

function disposedServices(records: readonly LogRecord[]): unknown[] {
  return records.filter((record) => record.event === 'disposed').map((record) => record.service);
}

describe('runDemo', () => {
  it('should render the initial frame and one frame per button press', async () => {
    const { frames } = await runDemo();

    expect(frames).toHaveLength(3);
    expect(frames[0]?.[3]).toBe('NotificationService1 match: no');
    expect(frames[0]?.[6]).toBe('NotificationService match: yes');
    expect(frames[0]?.[9]).toBe('Message: ');
    expect(frames[0]?.[10]).toBe('Live instances: 6');
    expect(frames[1]?.[9]).toMatch(/^Message: Updated at \d{2}:\d{2}:\d{2}$/);
  });

  it('should keep the same instances across frames', async () => {
    const { frames } = await runDemo();

    expect(frames[2]?.slice(1, 9)).toEqual(frames[0]?.slice(1, 9));
  });

  it('should log six creations and six disposals at info level', async () => {
    const { records } = await runDemo();

    expect(records).toHaveLength(12);
    expect(records.every((record) => record.level === 30 && record.$label === 'demo')).toBe(true);
    expect(records.filter((record) => record.event === 'created')).toHaveLength(6);
  });

  it('should dispose the page scope before the application scope, newest first', async () => {
    const { records } = await runDemo();

    expect(disposedServices(records)).toEqual([
      'ViewService',
      'TransientService',
      'NotificationService1',
      'TransientService',
      'NotificationService1',
      'NotificationService',
    ]);
  });

  it('should log every created uid as disposed', async () => {
    const { records } = await runDemo();

    const created = records.filter((r) => r.event === 'created').map((r) => r.uid);
    const disposed = records.filter((r) => r.event === 'disposed').map((r) => r.uid);

    expect([...disposed].sort()).toEqual([...created].sort());
  });

  it('should write debug records only when configured', async () => {
    const { records } = await runDemo({ config: { ...defaultConfig, logLevel: 'debug' } });

    const messages = records.map((record) => record.msg);
    expect(messages).toContain('ScopeDemoPage initialized');
    expect(messages).toContain('Component unmounted');
    expect(messages.filter((msg) => msg === 'Scope disposed')).toHaveLength(2);
  });

  it('should copy records to extra destinations', async () => {
    const extra = new MemoryLogSink();

    const { records } = await runDemo({ destinations: [extra] });

    expect(extra.records).toEqual(records);
  });

  it('should run with eager singletons and without scope validation', async () => {
    const { frames } = await runDemo({
      config: { ...defaultConfig, validateScopes: false, eagerSingletons: true },
    });

    expect(frames).toHaveLength(3);
  });
});

describe('configureServices', () => {
  it('should register the demo services with their lifetimes', () => {
    const services = configureServices(createServiceCollection());

    expect(services.getDescriptor(ViewService)?.lifetime).toBe(ServiceLifetime.Scoped);
    expect(services.getDescriptor(NotificationService2)?.lifetime).toBe(ServiceLifetime.Scoped);
    expect(services.getDescriptors()).toHaveLength(6);
  });

  it('should give a third scoped instance when NotificationService2 is resolved', async () => {
    const { app } = createTestApplication();
    const scope = app.provider.createScope();

    const first = scope.resolve(NotificationService2);

    expect(scope.resolve(NotificationService2)).toBe(first);
    expect(app.appScope.resolve(NotificationService2)).not.toBe(first);

    await scope.dispose();
    expect(first.disposed).toBe(true);
    await app.dispose();
  });
});
