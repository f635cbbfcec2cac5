import assert from 'node:assert/strict';
import { test } from 'node:test';

import { CalibrationSelector, RecordStore, type CalibrationRecord } from '../src';
import { makeRecord } from './helpers/calibrations';

interface Exposure {
  datetimeObs: string;
  spectrograph: string;
}

/** Latest master dark for the exposure's spectrograph, else any dark taken before it. */
class MasterDarkSelector extends CalibrationSelector<Exposure> {
  protected getCandidates(input: Exposure, store: RecordStore): CalibrationRecord[] {
    return store.query(
      {
        calType: 'dark',
        masterCal: true,
        dateTimeEnd: input.datetimeObs,
        where: { spectrograph: input.spectrograph }
      },
      { orderBy: 'datetime_obs', direction: 'desc' }
    );
  }

  protected selectFallback(input: Exposure, store: RecordStore): CalibrationRecord | null {
    return store.queryFirst({ calType: 'dark', dateTimeEnd: input.datetimeObs }, { orderBy: 'datetime_obs', direction: 'desc' });
  }
}

test('selects the best candidate from the primary tier', (t) => {
  const store = new RecordStore({ databasePath: ':memory:' });
  t.after(() => store.close());

  const older = makeRecord({ masterCal: true, datetimeObs: '2024-09-20T00:00:00', attributes: { spectrograph: 'RED' } });
  const newer = makeRecord({ masterCal: true, datetimeObs: '2024-09-22T00:00:00', attributes: { spectrograph: 'RED' } });
  const later = makeRecord({ masterCal: true, datetimeObs: '2024-09-30T00:00:00', attributes: { spectrograph: 'RED' } });
  store.add([older, newer, later]);

  const selected = new MasterDarkSelector().select({ datetimeObs: '2024-09-24T00:00:00', spectrograph: 'RED' }, store, {});
  assert.equal(selected?.id, newer.id);
});

test('falls back when the primary tier is empty', (t) => {
  const store = new RecordStore({ databasePath: ':memory:' });
  t.after(() => store.close());

  const perExposure = makeRecord({ datetimeObs: '2024-09-21T00:00:00', attributes: { spectrograph: 'GREEN' } });
  store.add([perExposure]);

  const selector = new MasterDarkSelector();
  assert.equal(
    selector.select({ datetimeObs: '2024-09-24T00:00:00', spectrograph: 'RED' }, store, {})?.id,
    perExposure.id
  );
  assert.equal(selector.select({ datetimeObs: '2024-09-01T00:00:00', spectrograph: 'RED' }, store, {}), null);
});
