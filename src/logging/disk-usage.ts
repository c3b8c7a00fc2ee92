import { promises as fsp } from 'fs';
import type { Logger } from './types';

const GB = 1024 ** 3;

export interface DiskUsage {
  path: string;
  totalBytes: number;
  usedBytes: number;
  freeBytes: number;
}

export async function getDiskUsage(target: string): Promise<DiskUsage> {
  const stats = await fsp.statfs(target);
  const totalBytes = stats.blocks * stats.bsize;
  const freeBytes = stats.bavail * stats.bsize;
  return {
    path: target,
    totalBytes,
    freeBytes,
    usedBytes: totalBytes - stats.bfree * stats.bsize,
  };
}

/**
 * Render e.g. "[████----] 50.0% used | Total: 1.00 GB | Used: 0.50 GB | Free: 0.50 GB"
 */
export function formatDiskUsage(usage: DiskUsage, barLength = 40): string {
  const usedFraction = usage.totalBytes > 0 ? usage.usedBytes / usage.totalBytes : 0;
  const usedBlocks = Math.floor(barLength * usedFraction);
  const bar = '█'.repeat(usedBlocks) + '-'.repeat(barLength - usedBlocks);
  return (
    `[${bar}] ${(usedFraction * 100).toFixed(1)}% used | ` +
    `Total: ${(usage.totalBytes / GB).toFixed(2)} GB | ` +
    `Used: ${(usage.usedBytes / GB).toFixed(2)} GB | ` +
    `Free: ${(usage.freeBytes / GB).toFixed(2)} GB`
  );
}

export async function reportDiskUsage(paths: readonly string[], logger: Logger): Promise<void> {
  for (const target of paths) {
    try {
      const usage = await getDiskUsage(target);
      logger.info(`Disk usage ${target}: ${formatDiskUsage(usage)}`);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.warn(`Cannot read disk usage for ${target}: ${errorMessage}`);
    }
  }
}
