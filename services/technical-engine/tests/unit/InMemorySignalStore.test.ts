import { InMemorySignalStore } from '../../src/adapters/InMemorySignalStore';
import { DEFAULT_ENGINE_CONFIG } from '../../src/config/ConfigLoader';
import { DecisionEngine } from '../../src/engine/DecisionEngine';
import { ScoringEngine } from '../../src/engine/ScoringEngine';
import type { Decision, EvaluationContext, StoredSignal } from '../../src/types';

const scoring = new ScoringEngine(DEFAULT_ENGINE_CONFIG.scoring);

function decision(context: EvaluationContext, overrides: Partial<Decision> = {}): Decision {
  return {
    ...DecisionEngine.noEvaluation({ symbol: 'BTCUSDT', direction: 'long', context }, 'fixture', scoring),
    evaluated: true,
    timestamp: 1_700_000_000_000,
    ...overrides,
  };
}

function pendingSignal(overrides: Partial<StoredSignal> = {}): StoredSignal {
  return {
    id: 'sig-1',
    symbol: 'BTCUSDT',
    direction: 'long',
    context: 'reactivation',
    createdAt: 1,
    ...overrides,
  };
}

describe('InMemorySignalStore', () => {
  let store: InMemorySignalStore;

  beforeEach(() => {
    store = new InMemorySignalStore();
  });

  it('should record every saved decision', async () => {
    const saved = decision('entry', { decision: 'enter', allowed: true });
    await store.saveDecision('BTCUSDT', 'entry', saved.evidence.scores, saved);

    const history = store.getDecisions('BTCUSDT');
    expect(history).toHaveLength(1);
    expect(history[0].decision).toBe(saved);
    expect(store.getDecisions('ETHUSDT')).toEqual([]);
  });

  it('should queue an evaluated entry wait for reactivation', async () => {
    const saved = decision('entry', { decision: 'wait' });
    await store.saveDecision('BTCUSDT', 'entry', saved.evidence.scores, saved);

    expect(await store.getPending('reactivation')).toEqual([
      {
        id: 'BTCUSDT-1700000000000',
        symbol: 'BTCUSDT',
        direction: 'long',
        context: 'reactivation',
        createdAt: 1_700_000_000_000,
        lastDecision: 'wait',
        lastEvaluatedAt: 1_700_000_000_000,
      },
    ]);
  });

  it('should queue at most one reactivation per symbol', async () => {
    const first = decision('entry', { decision: 'wait' });
    const second = decision('entry', { decision: 'wait', timestamp: 1_700_000_060_000 });
    await store.saveDecision('BTCUSDT', 'entry', first.evidence.scores, first);
    await store.saveDecision('BTCUSDT', 'entry', second.evidence.scores, second);

    expect(await store.getPending('reactivation')).toHaveLength(1);
  });

  it('should not queue a fail-closed entry', async () => {
    const saved = decision('entry', { decision: 'wait', evaluated: false });
    await store.saveDecision('BTCUSDT', 'entry', saved.evidence.scores, saved);

    expect(await store.getPending('reactivation')).toEqual([]);
  });

  it('should resolve a pending reactivation on enter', async () => {
    store.addSignal(pendingSignal());
    const saved = decision('reactivation', { decision: 'enter', allowed: true });
    await store.saveDecision('BTCUSDT', 'reactivation', saved.evidence.scores, saved);

    expect(await store.getPending('reactivation')).toEqual([]);
  });

  it('should keep an unresolved signal and note the latest decision', async () => {
    store.addSignal(pendingSignal({ id: 'pos-1', context: 'position' }));
    const saved = decision('position', { decision: 'keep', allowed: true, timestamp: 42 });
    await store.saveDecision('BTCUSDT', 'position', saved.evidence.scores, saved);

    const [pending] = await store.getPending('position');
    expect(pending.lastDecision).toBe('keep');
    expect(pending.lastEvaluatedAt).toBe(42);
  });

  it('should resolve a position on reverse', async () => {
    store.addSignal(pendingSignal({ id: 'pos-1', context: 'position' }));
    const saved = decision('position', { decision: 'reverse' });
    await store.saveDecision('BTCUSDT', 'position', saved.evidence.scores, saved);

    expect(await store.getPending('position')).toEqual([]);
  });

  it('should leave other symbols untouched', async () => {
    store.addSignal(pendingSignal({ id: 'eth', symbol: 'ETHUSDT' }));
    const saved = decision('reactivation', { decision: 'enter', allowed: true });
    await store.saveDecision('BTCUSDT', 'reactivation', saved.evidence.scores, saved);

    expect((await store.getPending('reactivation')).map((s) => s.id)).toEqual(['eth']);
  });

  it('should list pending signals oldest first', async () => {
    store.addSignal(pendingSignal({ id: 'late', createdAt: 30 }));
    store.addSignal(pendingSignal({ id: 'early', symbol: 'ETHUSDT', createdAt: 10 }));

    expect((await store.getPending('reactivation')).map((s) => s.id)).toEqual(['early', 'late']);
  });

  it('should remove signals by id', () => {
    store.addSignal(pendingSignal());
    expect(store.removeSignal('sig-1')).toBe(true);
    expect(store.removeSignal('sig-1')).toBe(false);
  });
});
