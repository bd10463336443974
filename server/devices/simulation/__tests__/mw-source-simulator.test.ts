import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { createMwSourceSimulator, type MwSourceSimulator } from '../mw-source-simulator.js';

describe('MwSourceSimulator', () => {
  let sim: MwSourceSimulator;
  let warnSpy: MockInstance<typeof console.warn>;

  beforeEach(() => {
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    sim = createMwSourceSimulator();
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('Identification', () => {
    it('should identify as the configured model', () => {
      const custom = createMwSourceSimulator({ model: 'SMA100B', serialNumber: '200002' });
      expect(custom.handleCommand('*IDN?')).toBe('Rohde&Schwarz,SMA100B,1406.6000k03/200002,4.30.046.32');
    });

    it('should report completion immediately by default', () => {
      sim.handleCommand(':FREQ 2 GHz');
      expect(sim.handleCommand('*OPC?')).toBe('1');
    });

    it('should report busy for the configured number of polls after a setting', () => {
      sim.setOpcBusyPolls(2);
      sim.handleCommand(':POW -10');
      sim.handleCommand('*WAI');

      expect(sim.handleCommand('*OPC?')).toBe('0');
      expect(sim.handleCommand('*OPC?')).toBe('0');
      expect(sim.handleCommand('*OPC?')).toBe('1');
    });
  });

  describe('CW settings', () => {
    it('should start in CW with RF off', () => {
      expect(sim.handleCommand('OUTP:STAT?')).toBe('0');
      expect(sim.handleCommand(':FREQ:MODE?')).toBe('CW');
      expect(sim.handleCommand(':FREQ?')).toBe('1000000000');
      expect(sim.handleCommand(':POW?')).toBe('-30.00');
    });

    it('should accept frequencies with unit suffixes and reply in Hz', () => {
      sim.handleCommand(':FREQ 2.500000 GHz');
      expect(sim.handleCommand(':FREQ?')).toBe('2500000000');
    });

    it('should accept the SOUR prefix and lower case', () => {
      sim.handleCommand('sour1:pow -12.5');
      expect(sim.handleCommand('SOUR:POW?')).toBe('-12.50');
    });

    it('should clamp power to the instrument range', () => {
      sim.handleCommand(':POW 40');
      expect(sim.handleCommand(':POW?')).toBe('18.00');
    });

    it('should queue an error for an unparsable value', () => {
      sim.handleCommand(':FREQ fast');
      expect(sim.handleCommand('SYST:ERR?')).toBe('-224,"Illegal parameter value;fast"');
      expect(sim.handleCommand(':FREQ?')).toBe('1000000000');
    });
  });

  describe('Mode and RF lock', () => {
    it('should switch frequency mode while RF is off', () => {
      sim.handleCommand(':FREQ:MODE SWE');
      expect(sim.handleCommand(':FREQ:MODE?')).toBe('SWE');
      sim.handleCommand(':FREQ:MODE FIX');
      expect(sim.handleCommand(':FREQ:MODE?')).toBe('CW');
    });

    it('should refuse a mode change while RF is on', () => {
      sim.handleCommand(':OUTP:STAT ON');
      sim.handleCommand(':FREQ:MODE LIST');

      expect(sim.handleCommand(':FREQ:MODE?')).toBe('CW');
      expect(sim.handleCommand('SYST:ERR?')).toBe('-221,"Settings conflict;FREQ:MODE while RF on"');
    });

    it('should refuse a trigger slope change while RF is on', () => {
      sim.handleCommand(':OUTP:STAT ON');
      sim.handleCommand(':TRIG1:SLOP NEG');
      expect(sim.handleCommand(':TRIG1:SLOP?')).toBe('POS');

      sim.handleCommand(':OUTP:STAT OFF');
      sim.handleCommand(':TRIG1:SLOP NEG');
      expect(sim.handleCommand(':TRIG1:SLOP?')).toBe('NEG');
    });
  });

  describe('Lists', () => {
    it('should store frequencies and levels on the selected list', () => {
      sim.handleCommand(':LIST:SEL "bench_list"');
      sim.handleCommand(':LIST:FREQ 1.000000 GHz, 2.000000 GHz');
      sim.handleCommand(':LIST:POW -10.00, -5.00');

      expect(sim.handleCommand(':LIST:FREQ?')).toBe('1000000000,2000000000');
      expect(sim.handleCommand(':LIST:POW?')).toBe('-10.00,-5.00');
      expect(sim.handleCommand(':LIST:FREQ:POIN?')).toBe('2');
      expect(sim.handleCommand(':LIST:POW:POIN?')).toBe('2');
      expect(sim.getState().selectedList).toBe('bench_list');
    });

    it('should report zero points for a fresh list', () => {
      sim.handleCommand(':LIST:SEL "empty"');
      expect(sim.handleCommand(':LIST:FREQ:POIN?')).toBe('0');
      expect(sim.handleCommand(':LIST:FREQ?')).toBe('');
    });

    it('should refuse list data without a selected list', () => {
      sim.handleCommand(':LIST:FREQ 1 GHz');
      expect(sim.handleCommand('SYST:ERR?')).toBe('-221,"Settings conflict;no list selected"');
    });

    it('should reset the list position', () => {
      sim.handleCommand(':LIST:RES');
      expect(sim.handleCommand(':LIST:IND?')).toBe('0');
    });
  });

  describe('Sweep', () => {
    it('should store the sweep range and step', () => {
      sim.handleCommand(':FREQ:STAR 0.990000 GHz');
      sim.handleCommand(':FREQ:STOP 2.000000 GHz');
      sim.handleCommand(':SWE:STEP:LIN 0.010000 GHz');

      expect(sim.handleCommand(':FREQ:STAR?')).toBe('990000000');
      expect(sim.handleCommand(':FREQ:STOP?')).toBe('2000000000');
      expect(sim.handleCommand(':SWE:STEP?')).toBe('10000000');
    });
  });

  describe('Reset and errors', () => {
    it('should restore defaults on *RST', () => {
      sim.handleCommand(':OUTP:STAT ON');
      sim.handleCommand(':POW 5');
      sim.handleCommand('*RST');

      expect(sim.handleCommand('OUTP:STAT?')).toBe('0');
      expect(sim.handleCommand(':POW?')).toBe('-30.00');
    });

    it('should report no error on an empty queue', () => {
      expect(sim.handleCommand('SYST:ERR?')).toBe('0,"No error"');
    });

    it('should queue an undefined header error for unknown commands', () => {
      expect(sim.handleCommand(':BOGUS 1')).toBe('');
      expect(sim.getErrors()).toEqual(['-113,"Undefined header;:BOGUS"']);
      expect(warnSpy).toHaveBeenCalledWith('[SMB Simulator] Unknown command: :BOGUS 1');
    });

    it('should clear the error queue on *CLS', () => {
      sim.handleCommand(':BOGUS');
      sim.handleCommand('*CLS');
      expect(sim.getErrors()).toEqual([]);
    });
  });
});
