import { DIContainer } from '../container';
import { Inject, Injectable } from '../decorators';

interface Clock {
  now(): number;
}

@Injectable()
class Counter {
  value = 0;
}

@Injectable()
class Reporter {
  constructor(
    @Inject('Clock') readonly clock: Clock,
    readonly counter: Counter,
  ) {}
}

class Plain {
  constructor(readonly label: string) {}
}

@Injectable()
class NeedsPlain {
  constructor(readonly plain: Plain) {}
}

describe('DIContainer', () => {
  let container: DIContainer;

  beforeEach(() => {
    container = new DIContainer();
  });

  it('returns one instance per singleton binding', () => {
    container.bind('Clock', () => ({ now: () => 42 }));

    expect(container.get<Clock>('Clock')).toBe(container.get<Clock>('Clock'));
  });

  it('builds a fresh instance for transient bindings', () => {
    container.bind(Counter, () => new Counter(), false);

    expect(container.get(Counter)).not.toBe(container.get(Counter));
  });

  it('resolves @Inject tokens and injectable parameter types', () => {
    container.bind('Clock', () => ({ now: () => 42 }));
    container.bindClass(Reporter, Reporter);

    const reporter = container.get(Reporter);

    expect(reporter.clock.now()).toBe(42);
    expect(reporter.counter).toBeInstanceOf(Counter);
    expect(container.get(Counter)).toBe(reporter.counter);
  });

  it('prefers an existing binding for a parameter type', () => {
    container.bind(Plain, () => new Plain('from factory'));
    container.bindClass(NeedsPlain, NeedsPlain);

    expect(container.get(NeedsPlain).plain.label).toBe('from factory');
  });

  it('names the token it cannot find', () => {
    expect(() => container.get('Missing')).toThrow('No binding found for token: Missing');
  });

  it('cannot build a class whose parameters are unknown', () => {
    container.bindClass(NeedsPlain, NeedsPlain);

    expect(() => container.get(NeedsPlain)).toThrow('Cannot resolve parameter #0 of NeedsPlain');
  });
});
