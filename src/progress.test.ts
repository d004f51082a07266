import { describe, expect, it } from 'vitest';
import { Writable } from 'stream';
import { ProgressTracker } from './progress.js';

function captureStream(): { stream: Writable; output: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });
  return { stream, output: () => chunks.join('') };
}

describe('ProgressTracker', () => {
  it('renders a bar, count and percentage', () => {
    const { stream } = captureStream();
    const tracker = new ProgressTracker({ total: 10, label: 'Scanning', stream });

    tracker.set(3);

    expect(tracker.render()).toBe('Scanning: [' + '█'.repeat(6) + '░'.repeat(14) + '] 3/10 30%');
  });

  it('renders without the bar when asked', () => {
    const { stream } = captureStream();
    const tracker = new ProgressTracker({ total: 4, showBar: false, stream });

    tracker.increment(2);

    expect(tracker.render()).toBe('Progress: 2/4 50%');
  });

  it('clamps progress to the total', () => {
    const { stream } = captureStream();
    const tracker = new ProgressTracker({ total: 5, stream });

    tracker.set(9);
    expect(tracker.getStats().current).toBe(5);
    tracker.set(-1);
    expect(tracker.getStats().current).toBe(0);
  });

  it('treats an empty run as complete', () => {
    const { stream } = captureStream();
    const stats = new ProgressTracker({ total: 0, stream }).getStats();

    expect(stats.percent).toBe(100);
    expect(stats.isComplete).toBe(true);
  });

  it('writes the final line and a newline on completion', () => {
    const { stream, output } = captureStream();
    const tracker = new ProgressTracker({ total: 2, label: 'Restoring', showBar: false, stream });

    tracker.complete();

    expect(output().endsWith('\rRestoring: 2/2 100%\n')).toBe(true);
  });
});
