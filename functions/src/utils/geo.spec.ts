import assert from 'node:assert/strict';
import test from 'node:test';
import { distanceKm, isValidGeoPoint } from './geo';

test('Geo helpers', async t => {
  await t.test('distance to the same point is zero', () => {
    assert.equal(distanceKm({ lat: 0.3476, lng: 32.5825 }, { lat: 0.3476, lng: 32.5825 }), 0);
  });

  await t.test('one degree of latitude is about 111 km', () => {
    const distance = distanceKm({ lat: 0, lng: 0 }, { lat: 1, lng: 0 });
    assert.ok(Math.abs(distance - 111.19) < 0.01, `got ${distance}`);
  });

  await t.test('distance is symmetric', () => {
    const kampala = { lat: 0.3476, lng: 32.5825 };
    const jinja = { lat: 0.4244, lng: 33.2042 };
    assert.ok(Math.abs(distanceKm(kampala, jinja) - distanceKm(jinja, kampala)) < 1e-9);
  });

  await t.test('rejects out-of-range coordinates', () => {
    assert.equal(isValidGeoPoint({ lat: 0.3, lng: 32.5 }), true);
    assert.equal(isValidGeoPoint({ lat: 91, lng: 0 }), false);
    assert.equal(isValidGeoPoint({ lat: 0, lng: -181 }), false);
    assert.equal(isValidGeoPoint({ lat: Number.NaN, lng: 0 }), false);
  });
});
