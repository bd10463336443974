import { describe, it, expect } from 'vitest';
import { Quantity, Hz, kHz, MHz, GHz, dBm, V, A, s, ms } from '../quantity.js';

describe('Quantity', () => {
  describe('construction', () => {
    it('creates frozen values', () => {
      const q = GHz(2.5);
      expect(q).toEqual({ magnitude: 2.5, unit: 'GHz' });
      expect(Object.isFrozen(q)).toBe(true);
    });

    it('reports unit families', () => {
      expect(Quantity.familyOf('MHz')).toBe('frequency');
      expect(Quantity.familyOf('dBm')).toBe('power');
      expect(Quantity.familyOf('ms')).toBe('time');
      expect(Quantity.isUnit('GHz')).toBe(true);
      expect(Quantity.isUnit('W')).toBe(false);
    });
  });

  describe('convertTo', () => {
    it('converts inside the frequency family', () => {
      const result = Quantity.convertTo(MHz(2500), 'GHz');
      expect(result).toEqual({ ok: true, value: { magnitude: 2.5, unit: 'GHz' } });
    });

    it('converts time', () => {
      const result = Quantity.convertTo(ms(1500), 's');
      expect(result).toEqual({ ok: true, value: { magnitude: 1.5, unit: 's' } });
    });

    it('fails across families', () => {
      const result = Quantity.convertTo(V(5), 'A');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('incompatible-unit-family');
        expect(result.error.message).toBe('Cannot convert V to A: different unit families');
      }
    });

    it('is transitive: Hz → kHz → GHz equals Hz → GHz', () => {
      const viaKhz = Quantity.convertTo(Hz(2_450_000_000), 'kHz');
      expect(viaKhz.ok).toBe(true);
      if (!viaKhz.ok) return;
      const chained = Quantity.convertTo(viaKhz.value, 'GHz');
      const direct = Quantity.convertTo(Hz(2_450_000_000), 'GHz');
      expect(chained.ok && direct.ok).toBe(true);
      if (chained.ok && direct.ok) {
        expect(Quantity.isClose(chained.value, direct.value)).toBe(true);
      }
    });

    it('is the identity for the same unit', () => {
      expect(Quantity.convertTo(dBm(-10), 'dBm')).toEqual({ ok: true, value: { magnitude: -10, unit: 'dBm' } });
    });
  });

  describe('magnitudeIn / to', () => {
    it('reads a magnitude in another unit', () => {
      expect(Quantity.magnitudeIn(kHz(10), 'Hz')).toEqual({ ok: true, value: 10_000 });
      expect(Quantity.magnitudeIn(dBm(0), 'V').ok).toBe(false);
    });

    it('converts statically same-family quantities', () => {
      expect(Quantity.to(MHz(10), 'GHz')).toEqual({ magnitude: 0.01, unit: 'GHz' });
    });
  });

  describe('arithmetic', () => {
    it('adds in the unit of the left operand', () => {
      expect(Quantity.add(GHz(1), MHz(10))).toEqual({ magnitude: 1.01, unit: 'GHz' });
    });

    it('subtracts in the unit of the left operand', () => {
      const result = Quantity.subtract(GHz(1), MHz(10));
      expect(result.unit).toBe('GHz');
      expect(result.magnitude).toBeCloseTo(0.99, 12);
    });
  });

  describe('compare / isClose', () => {
    it('orders quantities across units', () => {
      expect(Quantity.compare(MHz(999), GHz(1))).toEqual({ ok: true, value: -1 });
      expect(Quantity.compare(GHz(1), MHz(1000))).toEqual({ ok: true, value: 0 });
      expect(Quantity.compare(s(2), ms(1500))).toEqual({ ok: true, value: 1 });
    });

    it('fails to compare different families', () => {
      expect(Quantity.compare(V(1), A(1)).ok).toBe(false);
    });

    it('treats different families as never close', () => {
      expect(Quantity.isClose(V(1), A(1))).toBe(false);
      expect(Quantity.isClose(Hz(1e9), GHz(1))).toBe(true);
    });
  });

  describe('format', () => {
    it('uses per-family default precision', () => {
      expect(Quantity.format(GHz(2.5))).toBe('2.500000 GHz');
      expect(Quantity.format(dBm(-10))).toBe('-10.00 dBm');
      expect(Quantity.format(V(12))).toBe('12.00 V');
      expect(Quantity.format(ms(20))).toBe('20.000 ms');
    });

    it('accepts an explicit precision', () => {
      expect(Quantity.format(A(0.12), 4)).toBe('0.1200 A');
      expect(Quantity.formatMagnitude(dBm(-3.456))).toBe('-3.46');
    });
  });

  describe('parse', () => {
    it('takes the default unit for bare numbers', () => {
      expect(Quantity.parse('2500000000', 'frequency', 'Hz')).toEqual({
        ok: true,
        value: { magnitude: 2.5e9, unit: 'Hz' },
      });
    });

    it('accepts a unit suffix, case-insensitively', () => {
      expect(Quantity.parse('2.500000 GHz', 'frequency', 'Hz')).toEqual({
        ok: true,
        value: { magnitude: 2.5, unit: 'GHz' },
      });
      expect(Quantity.parse('10MHZ', 'frequency', 'Hz')).toEqual({
        ok: true,
        value: { magnitude: 10, unit: 'MHz' },
      });
      expect(Quantity.parse('-10.00dBm', 'power', 'dBm')).toEqual({
        ok: true,
        value: { magnitude: -10, unit: 'dBm' },
      });
    });

    it('rejects suffixes of another family', () => {
      expect(Quantity.parse('5 V', 'frequency', 'Hz')).toEqual({
        ok: false,
        error: 'unit V is not a frequency unit',
      });
    });

    it('rejects unknown suffixes and non-numbers', () => {
      expect(Quantity.parse('5 furlongs', 'frequency', 'Hz')).toEqual({ ok: false, error: 'unknown unit "furlongs"' });
      expect(Quantity.parse('AUTO', 'power', 'dBm')).toEqual({ ok: false, error: 'not a quantity: "AUTO"' });
    });
  });
});
