import { describe, it, expect, afterEach, vi } from 'vitest';
import { ProgressIndicator } from './progress.js';

function capture() {
  const chunks: string[] = [];
  return { chunks, output: { write: (chunk: string) => chunks.push(chunk) } };
}

describe('ProgressIndicator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should redraw the step line with a percentage', () => {
    const { chunks, output } = capture();
    const progress = new ProgressIndicator(false, output);

    progress.start(4, 'Saving files');
    progress.increment('index.ts');

    expect(chunks).toEqual(['\r\x1b[KSaving files: [0/4] 0%', '\r\x1b[KSaving files: [1/4] 25% - index.ts']);
  });

  it('should truncate long item names', () => {
    const { chunks, output } = capture();
    const progress = new ProgressIndicator(false, output);

    progress.start(1, 'Step');
    progress.update(1, 'x'.repeat(80));

    expect(chunks[1]).toBe(`\r\x1b[KStep: [1/1] 100% - ${'x'.repeat(67)}...`);
  });

  it('should report the elapsed time on completion', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const { chunks, output } = capture();
    const progress = new ProgressIndicator(false, output);

    progress.start(2, 'Saving files');
    vi.setSystemTime(new Date('2026-01-01T00:00:01.500Z'));
    progress.complete();

    expect(chunks.at(-1)).toBe('\r\x1b[KSaving files: [2/2] 100% ✓ (1.5s)\n');
  });

  it('should print messages and warnings on their own lines', () => {
    const { chunks, output } = capture();
    const progress = new ProgressIndicator(false, output);

    progress.message('Loading');
    progress.warn('#/components/schemas/Animal: discriminated unions are not supported');

    expect(chunks).toEqual(['\r\x1b[KLoading\n', '\r\x1b[K⚠️  #/components/schemas/Animal: discriminated unions are not supported\n']);
  });

  it('should write nothing when disabled', () => {
    const { chunks, output } = capture();
    const progress = new ProgressIndicator(true, output);

    progress.start(3, 'Step');
    progress.increment();
    progress.message('hidden');
    progress.warn('hidden');
    progress.complete();

    expect(chunks).toEqual([]);
  });
});
