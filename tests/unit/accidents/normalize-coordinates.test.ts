import { describe, expect, it } from 'vitest';

import {
  computeBounds,
  toStatePoints,
} from '@/modules/accidents/core/usecases/normalize-coordinates.js';

import { createRecord } from '../../fixtures/builders.js';

describe('toStatePoints', () => {
  it('replaces coordinates above the sentinel thresholds with null', () => {
    const points = toStatePoints([
      createRecord({ latitude: 88.8888, longitude: 888.8888 }),
      createRecord({ latitude: 90.5, longitude: 900.5 }),
      createRecord({ latitude: 90, longitude: 900 }),
    ]);

    expect(points).toEqual([
      { longitude: 888.8888, latitude: 88.8888 },
      { longitude: null, latitude: null },
      { longitude: 900, latitude: 90 },
    ]);
  });

  it('keeps blank coordinates null', () => {
    expect(toStatePoints([createRecord({ latitude: null, longitude: -86.8 })])).toEqual([
      { longitude: -86.8, latitude: null },
    ]);
  });
});

describe('computeBounds', () => {
  it('ranges each axis over its own known values', () => {
    expect(
      computeBounds([
        { longitude: -90, latitude: null },
        { longitude: null, latitude: 30 },
        { longitude: -80, latitude: 35 },
      ])
    ).toEqual({ latitude: [30, 35], longitude: [-90, -80] });
  });

  it('returns null when an axis has no known value', () => {
    expect(computeBounds([{ longitude: -90, latitude: null }])).toBeNull();
    expect(computeBounds([])).toBeNull();
  });
});
