import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { deadline, linkSignals } from './abort.js';

describe('linkSignals', () => {
  it('aborts with the reason of whichever source aborts', () => {
    const a = new AbortController();
    const b = new AbortController();
    const linked = linkSignals(a.signal, undefined, b.signal);

    b.abort('second');

    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBe('second');
  });

  it('starts aborted when a source already is', () => {
    const a = new AbortController();
    a.abort('early');

    expect(linkSignals(a.signal).signal.reason).toBe('early');
  });

  it('stops listening after dispose', () => {
    const a = new AbortController();
    const linked = linkSignals(a.signal);

    linked.dispose();
    a.abort('late');

    expect(linked.signal.aborted).toBe(false);
  });
});

describe('deadline', () => {
  it('aborts with the produced reason after the delay', async () => {
    const timer = deadline(10, () => 'too slow');

    await sleep(30);

    expect(timer.signal.reason).toBe('too slow');
  });

  it('never fires once disposed', async () => {
    const timer = deadline(10, () => 'too slow');
    timer.dispose();

    await sleep(30);

    expect(timer.signal.aborted).toBe(false);
  });
});
