import assert from 'node:assert/strict';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test, type TestContext } from 'node:test';

import { CalibrationStore, ConfigurationError, type SyncResult } from '../src';
import { TestCalibration, makeRecord } from './helpers/calibrations';
import { InMemoryArchive } from './helpers/inMemoryArchive';

const openPair = async (t: TestContext, withRemote = true) => {
  const cacheDir = await mkdtemp(path.join(os.tmpdir(), 'calibration-sync-'));
  const archive = new InMemoryArchive();
  const store = new CalibrationStore({
    instrument: 'KPF',
    cacheDir,
    databaseFilename: ':memory:',
    defaultOrigin: 'LOCAL',
    remote: withRemote ? archive : null
  });
  t.after(async () => {
    store.close();
    archive.close();
    await rm(cacheDir, { recursive: true, force: true });
  });
  return { store, archive };
};

const sortedIds = (records: { id: string }[]) => records.map((record) => record.id).sort();

test('pulls remote records once and then reports nothing new', async (t) => {
  const { store, archive } = await openPair(t);
  const seeded = archive.records.add([makeRecord(), makeRecord({ calType: 'flat' }), makeRecord({ calType: 'bias' })]);

  const completed: SyncResult[] = [];
  store.on('sync:completed', (result) => completed.push(result));

  const first = await store.syncFromRemote();
  assert.equal(first.records.length, 3);
  for (const record of seeded) {
    assert.equal(store.recordStore.queryById(record.id)?.lastUpdated, record.lastUpdated);
  }

  const second = await store.syncFromRemote();
  assert.equal(second.records.length, 0);
  assert.deepEqual(
    completed.map((result) => [result.direction, result.mode, result.records.length]),
    [
      ['from-remote', 'last_updated', 3],
      ['from-remote', 'last_updated', 0]
    ]
  );
});

test('pushes local metadata to the remote', async (t) => {
  const { store, archive } = await openPair(t);
  const dark = new TestCalibration(makeRecord());
  const flat = new TestCalibration(makeRecord({ calType: 'flat' }));
  await store.register(dark);
  await store.register(flat);

  const first = await store.syncToRemote('id');
  assert.deepEqual(sortedIds(first.records), sortedIds([dark.record, flat.record]));
  assert.equal(archive.records.count(), 2);
  assert.equal(archive.files.size, 0);

  assert.equal((await store.syncToRemote()).records.length, 0);
  assert.equal((await store.syncToRemote('id')).records.length, 0);
});

test('id and last_updated modes agree on what is missing', async (t) => {
  const { store, archive } = await openPair(t);

  const sharedBatch = archive.records.add([makeRecord(), makeRecord()]);
  const [alreadyLocal, notYetLocal] = sharedBatch;
  assert.ok(alreadyLocal && notYetLocal);
  store.recordStore.add([alreadyLocal]);

  const byId = await store.getMissingRecords('remote', 'id');
  const byCursor = await store.getMissingRecords('remote', 'last_updated');
  assert.deepEqual(sortedIds(byId), [notYetLocal.id]);
  assert.deepEqual(sortedIds(byCursor), sortedIds(byId));

  const later = archive.records.add([makeRecord({ lastUpdated: '2999-01-01T00:00:00' })]);
  assert.deepEqual(
    sortedIds(await store.getMissingRecords('remote', 'last_updated')),
    sortedIds([notYetLocal, ...later])
  );
  assert.deepEqual(
    sortedIds(await store.getMissingRecords('remote', 'id')),
    sortedIds([notYetLocal, ...later])
  );
});

test('an empty side receives every record', async (t) => {
  const { store, archive } = await openPair(t);
  store.recordStore.add([makeRecord(), makeRecord()]);

  assert.equal((await store.getMissingRecords('local', 'last_updated')).length, 2);
  assert.equal((await store.getMissingRecords('remote', 'last_updated')).length, 0);
  assert.equal(archive.records.count(), 0);
});

test('sync needs a remote archive', async (t) => {
  const { store } = await openPair(t, false);

  await assert.rejects(store.syncFromRemote(), ConfigurationError);
  await assert.rejects(store.syncToRemote(), ConfigurationError);
  await assert.rejects(store.getMissingRecords('remote', 'id'), ConfigurationError);
});
