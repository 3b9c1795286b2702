/**
 * Snapshot URL builder tests
 */

import { describe, it, expect } from 'vitest';
import { snapshotUrl } from '../../../snapshot/url.js';

describe('snapshotUrl', () => {
  it('appends the snapshot path to the base URL', () => {
    expect(snapshotUrl('https://snapshots.example.test')).toBe('https://snapshots.example.test/snapshot');
  });

  it('appends the date when one is given', () => {
    expect(snapshotUrl('https://snapshots.example.test', '2020-01-01')).toBe(
      'https://snapshots.example.test/snapshot/2020-01-01'
    );
  });

  it('strips a trailing slash from the base URL', () => {
    expect(snapshotUrl('https://snapshots.example.test/')).toBe('https://snapshots.example.test/snapshot');
    expect(snapshotUrl('https://snapshots.example.test/', '2020-01-01')).toBe(
      'https://snapshots.example.test/snapshot/2020-01-01'
    );
  });

  it('strips only one trailing slash', () => {
    expect(snapshotUrl('https://snapshots.example.test//')).toBe('https://snapshots.example.test//snapshot');
  });

  it('keeps base URL paths', () => {
    expect(snapshotUrl('file:///srv/mirror', '2021-06-30')).toBe('file:///srv/mirror/snapshot/2021-06-30');
  });

  it('does not validate the date', () => {
    expect(snapshotUrl('https://snapshots.example.test', 'latest')).toBe(
      'https://snapshots.example.test/snapshot/latest'
    );
  });

  it('treats an empty date as absent', () => {
    expect(snapshotUrl('https://snapshots.example.test', '')).toBe('https://snapshots.example.test/snapshot');
  });
});
