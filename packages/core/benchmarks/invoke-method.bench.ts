import { Bench } from 'tinybench';
import { AutoConfig, AutoConfigEffect, BaseObject, createContext, type ObjectConfig } from '../src';

/**
 * Dispatch & Construction Benchmark
 *
 * Compares name-based dispatch through invokeMethod() against direct calls at
 * several arities, and measures construction with and without
 * auto-configuration directives.
 */

interface MeterConfig extends ObjectConfig {
  unit?: string;
  labels?: Record<string, string>;
}

class Meter extends BaseObject<MeterConfig> {
  @AutoConfig({ initial: 'ms' })
  unit!: string;

  @AutoConfig({ effect: AutoConfigEffect.Merge, initial: () => ({ env: 'bench' }) })
  labels!: Record<string, string>;

  none(): number {
    return 0;
  }

  two(a: number, b: number): number {
    return a + b;
  }

  six(a: number, b: number, c: number, d: number, e: number, f: number): number {
    return a + b + c + d + e + f;
  }
}

class Bare extends BaseObject {}

const context = createContext({ deprecations: 'allow' });

async function runDispatchBenchmark() {
  console.log('=== Dispatch & Construction Benchmark ===\n');

  const bench = new Bench({ time: 500 });
  const meter = new Meter({ context });

  bench
    // D1-D3: direct calls as the baseline
    .add('D1: direct, 0 args', () => {
      meter.none();
    })
    .add('D2: direct, 2 args', () => {
      meter.two(1, 2);
    })
    .add('D3: direct, 6 args', () => {
      meter.six(1, 2, 3, 4, 5, 6);
    })

    // I1-I3: same calls by name
    .add('I1: invokeMethod, 0 args', () => {
      meter.invokeMethod('none');
    })
    .add('I2: invokeMethod, 2 args', () => {
      meter.invokeMethod('two', [1, 2]);
    })
    .add('I3: invokeMethod, 6 args', () => {
      meter.invokeMethod('six', [1, 2, 3, 4, 5, 6]);
    })

    // C1-C2: construction, cached directive table
    .add('C1: construct, no directives', () => {
      new Bare({ context });
    })
    .add('C2: construct, assign + merge', () => {
      new Meter({ context, unit: 's', labels: { host: 'a' } });
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getNs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.period ?? 0) * 1_000_000;
  };

  console.log('\nDispatch overhead (invokeMethod vs direct):');
  for (const [direct, named] of [
    ['D1: direct, 0 args', 'I1: invokeMethod, 0 args'],
    ['D2: direct, 2 args', 'I2: invokeMethod, 2 args'],
    ['D3: direct, 6 args', 'I3: invokeMethod, 6 args'],
  ]) {
    console.log(`  ${named.padEnd(28)} +${(getNs(named) - getNs(direct)).toFixed(0)} ns`);
  }
}

runDispatchBenchmark().catch(console.error);
