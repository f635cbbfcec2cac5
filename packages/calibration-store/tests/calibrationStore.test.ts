import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test, type TestContext } from 'node:test';

import {
  CalibrationNotFoundError,
  CalibrationSelector,
  CalibrationStore,
  CalibrationStoreError,
  CalibrationUnavailableError,
  ConfigurationError,
  VersionOverflowError,
  type CalibrationRecord,
  type CalibrationStoreOptions,
  type RecordStore
} from '../src';
import { TestCalibration, makeRecord } from './helpers/calibrations';
import { InMemoryArchive } from './helpers/inMemoryArchive';

const md5 = (content: string) => createHash('md5').update(content).digest('hex');

const openStore = async (t: TestContext, options: Partial<CalibrationStoreOptions> = {}) => {
  const cacheDir = await mkdtemp(path.join(os.tmpdir(), 'calibration-store-'));
  const store = new CalibrationStore({
    instrument: 'KPF',
    cacheDir,
    databaseFilename: ':memory:',
    defaultOrigin: 'LOCAL',
    ...options
  });
  t.after(async () => {
    store.close();
    await rm(cacheDir, { recursive: true, force: true });
  });
  return store;
};

test('creates the cache layout and default database file', async (t) => {
  const store = await openStore(t, { databaseFilename: undefined });

  assert.equal(store.calibrationsDir, path.join(store.cacheDir, 'calibrations', 'KPF'));
  assert.equal(store.databasePath, path.join(store.cacheDir, 'database', 'kpf_calibrations.db'));
  assert.equal((await stat(store.calibrationsDir)).isDirectory(), true);
  assert.equal((await stat(store.databasePath)).isFile(), true);
});

test('requires a cache directory', () => {
  assert.throws(() => new CalibrationStore({ instrument: 'KPF', cacheDir: '' }), ConfigurationError);
});

test('registers a calibration and serves it from the cache', async (t) => {
  const store = await openStore(t);
  const calibration = new TestCalibration(makeRecord({ filename: 'dark_001.fits' }));

  const registeredEvents: CalibrationRecord[] = [];
  store.on('calibration:registered', (record) => registeredEvents.push(record));

  const result = await store.register(calibration);
  assert.equal(result.status, 'registered');
  if (result.status !== 'registered') {
    return;
  }
  assert.equal(result.path, path.join(store.calibrationsDir, 'dark_001.fits'));
  assert.equal(result.record.calVersion, '001');
  assert.equal(result.record.origin, 'LOCAL');
  assert.equal(result.record.fileMd5, md5(calibration.content));
  assert.deepEqual(registeredEvents.map((record) => record.id), [calibration.record.id]);

  const fetched = await store.get(calibration.record.id);
  assert.equal(fetched.path, result.path);
  assert.equal(md5(await readFile(fetched.path, 'utf8')), fetched.record.fileMd5);

  const byFilename = await store.get('dark_001.fits');
  assert.equal(byFilename.record.id, calibration.record.id);
});

test('allocates consecutive versions when new versions are requested', async (t) => {
  const store = await openStore(t);

  const versions: (string | null)[] = [];
  for (let index = 0; index < 5; index += 1) {
    const result = await store.register(new TestCalibration(makeRecord()), { newVersion: true });
    assert.equal(result.status, 'registered');
    if (result.status === 'registered') {
      versions.push(result.record.calVersion);
    }
  }

  assert.deepEqual(versions, ['001', '002', '003', '004', '005']);
});

test('concurrent registrations in one process stay gap-free and unique', async (t) => {
  const store = await openStore(t);

  const results = await Promise.all(
    Array.from({ length: 12 }, () => store.register(new TestCalibration(makeRecord()), { newVersion: true }))
  );

  const versions = results
    .map((result) => (result.status === 'registered' ? result.record.calVersion : null))
    .sort();
  assert.deepEqual(
    versions,
    Array.from({ length: 12 }, (_, index) => String(index + 1).padStart(3, '0'))
  );
  assert.deepEqual(store.findVersionCollisions(), []);
});

test('skips duplicate ids without saving again', async (t) => {
  const store = await openStore(t);
  const calibration = new TestCalibration(makeRecord());

  await store.register(calibration);
  const again = await store.register(calibration);

  assert.equal(again.status, 'skipped');
  if (again.status === 'skipped') {
    assert.equal(again.reason, 'duplicate-id');
    assert.equal(again.existing.id, calibration.record.id);
  }
  assert.equal(calibration.saveCalls, 1);
  assert.equal(store.recordStore.count(), 1);
});

test('skips members of an existing version family unless asked for a new version', async (t) => {
  const store = await openStore(t);
  const first = new TestCalibration(makeRecord());
  await store.register(first);

  const sibling = new TestCalibration(makeRecord());
  const skipped = await store.register(sibling);
  assert.equal(skipped.status, 'skipped');
  if (skipped.status === 'skipped') {
    assert.equal(skipped.reason, 'version-family-exists');
    assert.equal(skipped.existing.id, first.record.id);
  }
  assert.equal(sibling.saveCalls, 0);

  const otherOrigin = await store.register(sibling, { origin: 'PIPELINE' });
  assert.equal(otherOrigin.status, 'registered');
  if (otherOrigin.status === 'registered') {
    assert.equal(otherOrigin.record.calVersion, '001');
    assert.equal(otherOrigin.record.origin, 'PIPELINE');
  }
});

test('aborts on version overflow before writing anything', async (t) => {
  const store = await openStore(t);
  store.recordStore.add([makeRecord({ calVersion: '999', origin: 'LOCAL' })]);

  const calibration = new TestCalibration(makeRecord());
  await assert.rejects(store.register(calibration, { newVersion: true }), VersionOverflowError);

  assert.equal(calibration.saveCalls, 0);
  assert.equal(store.recordStore.count(), 1);
});

test('a failed save leaves no record behind', async (t) => {
  const store = await openStore(t);
  const record = makeRecord();

  await assert.rejects(
    store.register({
      save: () => {
        throw new Error('disk full');
      },
      toRecord: () => record
    }),
    /disk full/
  );

  assert.equal(store.recordStore.queryById(record.id), null);
});

test('rejects calibrations saved outside the cache directory', async (t) => {
  const store = await openStore(t);
  const record = makeRecord();
  const elsewhere = path.join(store.cacheDir, 'elsewhere.fits');

  await assert.rejects(
    store.register({
      save: async () => {
        await writeFile(elsewhere, 'stray');
        return elsewhere;
      },
      toRecord: () => record
    }),
    CalibrationStoreError
  );

  assert.equal(store.recordStore.queryById(record.id), null);
});

test('reports unknown and unavailable calibrations without a remote', async (t) => {
  const store = await openStore(t);

  await assert.rejects(store.get('0b9c8d7e-6f5a-4b3c-8d2e-1f0a9b8c7d6e'), CalibrationNotFoundError);
  await assert.rejects(store.get('unknown.fits'), CalibrationNotFoundError);

  const [orphan] = store.recordStore.add([makeRecord({ filename: 'orphan.fits' })]);
  assert.ok(orphan);
  await assert.rejects(store.get(orphan.id), CalibrationUnavailableError);
  assert.deepEqual((await store.getMissingLocalFiles()).map((record) => record.id), [orphan.id]);
});

test('serves cache hits without touching the remote', async (t) => {
  const archive = new InMemoryArchive();
  t.after(() => archive.close());
  const store = await openStore(t, { remote: archive });

  const calibration = new TestCalibration(makeRecord());
  await store.register(calibration);
  await store.get(calibration.record.id);

  assert.equal(archive.downloads, 0);
  assert.equal(archive.queries, 0);
});

test('fetches unknown records and missing files from the remote', async (t) => {
  const archive = new InMemoryArchive();
  t.after(() => archive.close());
  const store = await openStore(t, { remote: archive });

  const remoteRecord = archive.seed(makeRecord({ filename: 'remote_dark.fits', origin: 'REMOTE' }), 'remote bytes');
  const downloaded: string[] = [];
  store.on('calibration:downloaded', (record) => downloaded.push(record.id));

  const first = await store.get(remoteRecord.id);
  assert.equal(first.path, path.join(store.calibrationsDir, 'remote_dark.fits'));
  assert.equal(await readFile(first.path, 'utf8'), 'remote bytes');
  assert.equal(store.recordStore.queryById(remoteRecord.id)?.lastUpdated, remoteRecord.lastUpdated);

  await store.get(remoteRecord.id);
  assert.equal(archive.downloads, 1);
  assert.deepEqual(downloaded, [remoteRecord.id]);

  await store.get(remoteRecord.id, { useCached: false });
  assert.equal(archive.downloads, 2);
});

test('looks up unknown filenames on the remote', async (t) => {
  const archive = new InMemoryArchive();
  t.after(() => archive.close());
  const store = await openStore(t, { remote: archive });

  const remoteRecord = archive.seed(makeRecord({ filename: 'remote_flat.fits', calType: 'flat' }), 'flat bytes');

  const result = await store.get('remote_flat.fits');
  assert.equal(result.record.id, remoteRecord.id);
  assert.equal(result.path, path.join(store.calibrationsDir, 'remote_flat.fits'));
  assert.equal(await readFile(result.path, 'utf8'), 'flat bytes');
  assert.equal(archive.queries, 1);
  assert.equal(store.recordStore.queryByFilename('remote_flat.fits')?.id, remoteRecord.id);

  await assert.rejects(store.get('nowhere.fits'), CalibrationNotFoundError);
  assert.equal(archive.queries, 2);
});

test('a failed download surfaces unchanged and keeps the fetched record', async (t) => {
  const archive = new InMemoryArchive();
  t.after(() => archive.close());
  const store = await openStore(t, { remote: archive });

  const remoteRecord = archive.seed(makeRecord({ filename: 'lost.fits' }));
  const downloaded: string[] = [];
  store.on('calibration:downloaded', (record) => downloaded.push(record.id));

  await assert.rejects(store.get(remoteRecord.id), {
    name: 'Error',
    message: `No archived file for ${remoteRecord.id}`
  });

  assert.equal(archive.downloads, 1);
  assert.equal(store.recordStore.queryById(remoteRecord.id)?.filename, 'lost.fits');
  assert.deepEqual(await readdir(store.calibrationsDir), []);
  assert.deepEqual(downloaded, []);
});

test('uses the cached file when a bypass is requested without a remote', async (t) => {
  const store = await openStore(t, { useCached: false });
  const calibration = new TestCalibration(makeRecord());
  await store.register(calibration);

  const result = await store.get(calibration.record.id);
  assert.equal(await readFile(result.path, 'utf8'), calibration.content);
});

test('populates records from files already in the cache', async (t) => {
  const store = await openStore(t);

  const dark = new TestCalibration(makeRecord({ filename: 'dark.fits' }));
  const flat = new TestCalibration(makeRecord({ filename: 'flat.fits', calType: 'flat' }));
  const missing = new TestCalibration(makeRecord({ filename: 'missing.fits' }));
  dark.save(store.calibrationsDir);
  flat.save(store.calibrationsDir);

  const first = await store.populateFromCache([dark, flat, missing]);
  assert.deepEqual(
    first.written.map((record) => [record.filename, record.calVersion, record.fileMd5]),
    [
      ['dark.fits', '001', md5(dark.content)],
      ['flat.fits', '001', md5(flat.content)]
    ]
  );
  assert.deepEqual(first.missingFiles, [missing.record.id]);

  const second = await store.populateFromCache([dark, flat]);
  assert.deepEqual(second.written, []);
  assert.deepEqual(second.unchanged, [dark.record.id, flat.record.id]);
  assert.equal(store.recordStore.count(), 2);
});

test('reset leaves everything in place unless confirmed', async (t) => {
  const store = await openStore(t);
  const calibration = new TestCalibration(makeRecord({ filename: 'keep.fits' }));
  await store.register(calibration);

  assert.equal(await store.reset(), false);
  assert.equal(store.recordStore.count(), 1);
  assert.deepEqual(await readdir(store.calibrationsDir), ['keep.fits']);

  assert.equal(await store.reset({ confirm: true }), true);
  assert.equal(store.recordStore.count(), 0);
  assert.deepEqual(await readdir(store.calibrationsDir), []);
});

test('selectAndGet resolves the selected record or reports no match', async (t) => {
  const store = await openStore(t);
  const calibration = new TestCalibration(makeRecord({ masterCal: true }));
  await store.register(calibration);

  class FirstMaster extends CalibrationSelector<{ calType: string }> {
    protected getCandidates(input: { calType: string }, records: RecordStore): CalibrationRecord[] {
      return records.query({ calType: input.calType, masterCal: true });
    }
  }

  const selected = await store.selectAndGet({ calType: 'dark' }, new FirstMaster(), {});
  assert.equal(selected.record.id, calibration.record.id);

  await assert.rejects(store.selectAndGet({ calType: 'flat' }, new FirstMaster(), {}), CalibrationNotFoundError);
});
