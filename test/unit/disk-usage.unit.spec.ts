/**
 * Unit tests for the disk usage report
 */

import * as os from 'os';
import * as path from 'path';
import { formatDiskUsage, getDiskUsage, reportDiskUsage } from '../../src/logging/disk-usage';
import { createTestLogger } from '../helpers';

const GB = 1024 ** 3;

describe('disk usage', () => {
  it('renders a usage bar with totals in GB', () => {
    const usage = { path: '/', totalBytes: 4 * GB, usedBytes: GB, freeBytes: 3 * GB };
    expect(formatDiskUsage(usage, 8)).toBe('[██------] 25.0% used | Total: 4.00 GB | Used: 1.00 GB | Free: 3.00 GB');
  });

  it('reads the filesystem holding a directory', async () => {
    const usage = await getDiskUsage(os.tmpdir());
    expect(usage.totalBytes).toBeGreaterThan(0);
    expect(usage.freeBytes).toBeLessThanOrEqual(usage.totalBytes);
  });

  it('warns about a path it cannot inspect', async () => {
    const logger = createTestLogger();
    const missing = path.join(os.tmpdir(), 'field-logger-no-such-dir', 'deeper');

    await reportDiskUsage([missing], logger);

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0].startsWith(`Cannot read disk usage for ${missing}: `)).toBe(true);
    expect(logger.info).not.toHaveBeenCalled();
  });
});
