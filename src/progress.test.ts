import { describe, it, expect } from 'vitest';
import { Writable } from 'stream';
import { BatchProgress } from './progress.js';

function capture(): { stream: Writable; output: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, output: () => chunks.join('') };
}

describe('BatchProgress', () => {
  it('renders a bar, count and percentage', () => {
    const tracker = new BatchProgress({ total: 4, label: 'Applying', enabled: false, showETA: false });
    tracker.increment();
    tracker.increment();

    expect(tracker.render()).toBe('Applying: [██████████░░░░░░░░░░] 2/4 files 50% 0s');
  });

  it('never counts past the total', () => {
    const tracker = new BatchProgress({ total: 2, enabled: false });
    tracker.increment(5);

    expect(tracker.getStats()).toMatchObject({ done: 2, total: 2, percent: 100, isComplete: true });
  });

  it('treats an empty batch as complete', () => {
    const tracker = new BatchProgress({ total: 0, enabled: false, showBar: false });

    expect(tracker.getStats().percent).toBe(100);
    expect(tracker.render()).toBe('Progress: 0/0 files 100% 0s');
  });

  it('draws to its stream when enabled', () => {
    const { stream, output } = capture();
    const tracker = new BatchProgress({ total: 2, label: 'Applying', stream, showETA: false });

    tracker.increment();
    tracker.increment();
    tracker.complete();

    expect(output()).toContain('\rApplying: [████████████████████] 2/2 files 100% 0s');
  });

  it('writes nothing when disabled', () => {
    const { stream, output } = capture();
    const tracker = new BatchProgress({ total: 2, enabled: false, stream });

    tracker.increment();
    tracker.complete();

    expect(output()).toBe('');
  });
});
