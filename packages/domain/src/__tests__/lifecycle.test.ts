import { describe, it, expect } from '@jest/globals';

import {
  assertFineTransition,
  assertReservationTransition,
  deriveVehicleStatus,
  InvalidTransition,
  isReleasable,
  operationalStatusAfterFines,
  operationalStatusFor,
  vehicleStatusFor,
} from '../index.js';

describe('reservation transitions', () => {
  it('allows the forward path and cancellation from reserved', () => {
    expect(() => assertReservationTransition('reserved', 'rented')).not.toThrow();
    expect(() => assertReservationTransition('rented', 'finalized')).not.toThrow();
    expect(() => assertReservationTransition('reserved', 'cancelled')).not.toThrow();
  });

  it('refuses to reopen terminal states', () => {
    expect(() => assertReservationTransition('finalized', 'rented')).toThrow(InvalidTransition);
    expect(() => assertReservationTransition('cancelled', 'reserved')).toThrow(InvalidTransition);
    expect(() => assertReservationTransition('rented', 'cancelled')).toThrow(InvalidTransition);
  });
});

describe('fine transitions', () => {
  it('resolves pending fines and allows reopening', () => {
    expect(() => assertFineTransition('pending', 'paid')).not.toThrow();
    expect(() => assertFineTransition('exempt', 'pending')).not.toThrow();
    expect(() => assertFineTransition('paid', 'paid')).not.toThrow();
  });

  it('refuses paid to exempt', () => {
    expect(() => assertFineTransition('paid', 'exempt')).toThrow(InvalidTransition);
  });
});

describe('status synchronization', () => {
  it('maps reservation status to vehicle status', () => {
    expect(vehicleStatusFor('reserved')).toBe('reserved');
    expect(vehicleStatusFor('rented')).toBe('rented');
    expect(vehicleStatusFor('cancelled')).toBe('available');
    expect(vehicleStatusFor('finalized')).toBe('available');
  });

  it('maps reservation status to operational status', () => {
    expect(operationalStatusFor('reserved')).toBe('active');
    expect(operationalStatusFor('cancelled')).toBe('inactive');
    expect(operationalStatusFor('finalized')).toBe('finalized');
  });

  it('reverts to finalized once no fine is pending', () => {
    expect(operationalStatusAfterFines(2)).toBe('fine_pending');
    expect(operationalStatusAfterFines(0)).toBe('finalized');
  });

  it('never releases unavailable or excluded vehicles', () => {
    expect(isReleasable('rented')).toBe(true);
    expect(isReleasable('unavailable')).toBe(false);
    expect(isReleasable('excluded')).toBe(false);
  });
});

describe('deriveVehicleStatus', () => {
  it('follows the single live reservation', () => {
    expect(deriveVehicleStatus('available', ['reserved'])).toBe('reserved');
    expect(deriveVehicleStatus('reserved', ['rented'])).toBe('rented');
    expect(deriveVehicleStatus('rented', [])).toBe('available');
  });

  it('keeps a rented vehicle rented when a later booking exists', () => {
    expect(deriveVehicleStatus('rented', ['reserved', 'rented'])).toBe('rented');
    expect(deriveVehicleStatus('rented', ['rented', 'reserved'])).toBe('rented');
  });

  it('leaves unavailable and excluded vehicles alone', () => {
    expect(deriveVehicleStatus('unavailable', ['reserved'])).toBe('unavailable');
    expect(deriveVehicleStatus('excluded', [])).toBe('excluded');
  });
});
