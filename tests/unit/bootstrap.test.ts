/**
 * Service Wiring Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { createServices } from '@/bootstrap.js';
import { loadConfig } from '@/lib/config.js';

import {
  bytesOfSize,
  createSilentLogger,
  createTestClock,
} from '../helpers/test-utils.js';

describe('createServices', () => {
  it('should wire the in-memory backends from the default configuration', async () => {
    const clock = createTestClock();
    const services = createServices(
      loadConfig({
        MIN_FILE_SIZE_BYTES: '1',
        HOT_TO_WARM_IDLE_DAYS: '2',
        WARM_TO_COLD_IDLE_DAYS: '4',
      }),
      { clock: clock.now, logger: createSilentLogger() }
    );

    const uploaded = await services.fileService.upload(bytesOfSize(10));
    if (!uploaded.success) throw new Error('upload failed');
    clock.advanceDays(3);
    const run = await services.runs.run();
    const metadata = await services.fileService.getMetadata(
      uploaded.data.fileId
    );

    expect(run.success && run.data.filesMoved).toBe(1);
    expect(metadata.success && metadata.data.tier).toBe('WARM');
  });

  it('should share one audit trail between the services', async () => {
    const services = createServices(loadConfig({ MIN_FILE_SIZE_BYTES: '1' }), {
      logger: createSilentLogger(),
    });

    const uploaded = await services.fileService.upload(bytesOfSize(10));
    const logs = await services.auditService.queryLogs({ limit: 10 });

    expect(uploaded.success).toBe(true);
    expect(logs.success && logs.data.map((log) => log.action)).toEqual([
      'file:uploaded',
    ]);
  });

  it('should leave the worker idle when no interval is configured', async () => {
    const logger = createSilentLogger();
    const services = createServices(loadConfig({}), { logger });

    services.worker.start();
    await services.worker.stop();

    expect(logger.info).not.toHaveBeenCalled();
  });
});
