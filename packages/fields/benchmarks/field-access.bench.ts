/**
 * Field Access Performance Benchmark
 *
 * Compares layout accessors against hand-written shift/mask code on the
 * M-sequence control octet.
 *
 * Scenarios:
 * 1. Hand-written read / write
 * 2. Generated accessors (getX / setX)
 * 3. Generic record get / set by name
 * 4. Pre-resolved reader / writer with an override
 * 5. Checked writes (return-bool)
 */

import { Bench } from 'tinybench';
import { createBitfields, enumOf, layout, u8 } from '../src/index.js';

// ==================== Test Setup ====================

enum Channel {
  Process,
  Page,
  Diagnosis,
  Isdu,
}

const MSequenceControl = layout(u8)
  .field('address', 5)
  .field('channel', 2, { type: enumOf(u8, Channel) })
  .field('direction', 1)
  .build({ name: 'MSequenceControl' });

const checked = createBitfields({ defaultStrategy: 'return-bool' });
const CheckedControl = checked
  .layout(u8)
  .field('address', 5)
  .field('channel', 2)
  .field('direction', 1)
  .build({ name: 'CheckedControl' });

const record = MSequenceControl.create(0b1010_0101);
const checkedRecord = CheckedControl.create(0b1010_0101);
const channelAtSource = MSequenceControl.fields.channel.reader({ type: u8, offset: 5 });
const channelWriter = MSequenceControl.fields.channel.writer({ strategy: 'unchecked' });

let sink = 0;

// ==================== Benchmark ====================

const bench = new Bench({
  name: 'Field Access Performance',
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

// Scenario 1: Hand-written shifting and masking
bench.add('baseline: hand-written read', () => {
  const raw = record.raw;
  sink += (raw & 0x1f) + ((raw >> 5) & 0x3) + ((raw >> 7) & 0x1);
});

bench.add('baseline: hand-written write', () => {
  let raw = record.raw;
  raw = (raw & ~0x60) | ((Channel.Page & 0x3) << 5);
  record.raw = raw;
});

// Scenario 2: Generated accessors
bench.add('accessor read', () => {
  sink += record.getAddress() + record.getChannel() + record.getDirection();
});

bench.add('accessor write (mask)', () => {
  record.setChannel(Channel.Page);
});

// Scenario 3: Generic access by name
bench.add('record get by name', () => {
  sink += record.get('address') + record.get('channel') + record.get('direction');
});

bench.add('record set by name', () => {
  record.set('channel', Channel.Isdu);
});

// Scenario 4: Override resolved once
bench.add('pre-resolved reader', () => {
  sink += channelAtSource(record.raw);
});

bench.add('pre-resolved writer (unchecked)', () => {
  channelWriter(record, Channel.Diagnosis);
});

// Scenario 5: Checked writes
bench.add('checked write (return-bool)', () => {
  if (!checkedRecord.setChannel(2)) throw new Error('Invalid');
});

bench.add('override per call (resolved each time)', () => {
  sink += record.getChannel({ type: u8, offset: 5 });
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Field Access Performance Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.period
      ? `${(1000 / task.result.period).toLocaleString('en-US', { maximumFractionDigits: 0 })}`
      : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
    hz: task.result?.hz ? task.result.hz.toFixed(2) : 'N/A',
  }))
);

const baseline = bench.tasks.find((t) => t.name === 'baseline: hand-written read');
const accessor = bench.tasks.find((t) => t.name === 'accessor read');

if (baseline?.result?.period && accessor?.result?.period) {
  const overhead = ((accessor.result.period - baseline.result.period) * 1000000).toFixed(2);
  console.log(`\nAccessor overhead per read of three fields: ${overhead}ns`);
}

console.log(`(checksum ${sink})`);
