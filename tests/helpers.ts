import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import type { Metric, ValueRecord } from '@/lib/types';

// three named shapes plus an unpainted label; regions 1 (id), 2 (data-region) and 3 (id)
export const TEMPLATE = `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 100 100">
  <style>.cls-1{fill:#ffffff}</style>
  <path id="1" class="cls-1" d="M0 0 L10 0 L10 10 Z"/>
  <polygon data-region="2" points="0,0 5,5 0,5" style="fill:#123456;opacity:0.5"/>
  <rect id="3" x="0" y="0" width="5" height="5" stroke="#ff0000"/>
  <text x="1" y="1">label</text>
</svg>`;

export function createTestLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'pnn-colormap-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function records(metric: Metric, entries: [region: string, group: string, value: number][]): ValueRecord[] {
  return entries.map(([region, group, value]) => ({ metric, region, group, value }));
}

export function channels(hex: string): [number, number, number] {
  return [
    parseInt(hex.slice(1, 3), 16),
    parseInt(hex.slice(3, 5), 16),
    parseInt(hex.slice(5, 7), 16),
  ];
}
