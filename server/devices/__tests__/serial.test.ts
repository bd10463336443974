import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventEmitter } from 'events';

type Callback = (err?: Error | null) => void;

// Stand-in for a SerialPort instance; the parser is piped from it
class FakePort extends EventEmitter {
  open = vi.fn((cb: Callback) => cb(openError));
  close = vi.fn((cb: () => void) => cb());
  write = vi.fn((_data: string, cb: Callback) => cb());
  pipe = vi.fn(() => parser);
}

let port: FakePort | null = null;
let parser = new EventEmitter();
let openError: Error | null = null;

// Mock SerialPort before importing
vi.mock('serialport', () => ({
  SerialPort: vi.fn().mockImplementation(function () {
    port = new FakePort();
    return port;
  }),
}));

vi.mock('@serialport/parser-readline', () => ({
  ReadlineParser: vi.fn().mockImplementation(function () {
    parser = new EventEmitter();
    return parser;
  }),
}));

import { SerialPort } from 'serialport';
import { createSerialTransport } from '../transports/serial.js';

function currentPort(): FakePort {
  if (!port) throw new Error('SerialPort was not constructed');
  return port;
}

// Let the queued query register its data listener
const tick = () => new Promise(resolve => setImmediate(resolve));

describe('Serial Transport', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    port = null;
    parser = new EventEmitter();
    openError = null;
  });

  describe('open()', () => {
    it('opens the port with the configured path and baud rate', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600 });
      const result = await transport.open();

      expect(result.ok).toBe(true);
      expect(SerialPort).toHaveBeenCalledWith({ path: '/dev/ttyUSB0', baudRate: 9600, autoOpen: false });
      expect(currentPort().open).toHaveBeenCalled();
      expect(transport.isOpen()).toBe(true);
    });

    it('is idempotent when already open', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600 });
      await transport.open();
      await transport.open();
      expect(currentPort().open).toHaveBeenCalledTimes(1);
    });

    it('returns a ConnectionError when the port cannot be opened', async () => {
      openError = new Error('Access denied');
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600 });

      const result = await transport.open();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('connection');
        expect(result.error.message).toBe('Cannot open /dev/ttyUSB0: Access denied');
      }
      expect(transport.isOpen()).toBe(false);
    });
  });

  describe('close()', () => {
    it('closes the port and removes listeners', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600 });
      await transport.open();
      const opened = currentPort();
      opened.on('data', () => {});

      await transport.close();

      expect(opened.close).toHaveBeenCalled();
      expect(opened.listenerCount('data')).toBe(0);
      expect(transport.isOpen()).toBe(false);
    });

    it('waits for an in-flight query before closing', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600, commandDelay: 0 });
      await transport.open();

      const queryPromise = transport.query('*IDN?');
      await tick();
      const closePromise = transport.close();

      expect(currentPort().close).not.toHaveBeenCalled();
      parser.emit('data', 'VENDOR,HMP2030,1,1\n');

      expect(await queryPromise).toEqual({ ok: true, value: 'VENDOR,HMP2030,1,1' });
      await closePromise;
      expect(currentPort().close).toHaveBeenCalledTimes(1);
    });
  });

  describe('query()', () => {
    it('sends a newline-terminated command and returns the trimmed line', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600, commandDelay: 0 });
      await transport.open();

      const queryPromise = transport.query('MEAS:VOLT?');
      await tick();
      parser.emit('data', '12.500\r');

      expect(await queryPromise).toEqual({ ok: true, value: '12.500' });
      expect(currentPort().write).toHaveBeenCalledWith('MEAS:VOLT?\n', expect.any(Function));
    });

    it('times out when no reply arrives', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600, commandDelay: 0, timeout: 10 });
      await transport.open();

      const result = await transport.query('*OPC?');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe('timeout');
        expect(result.error.message).toBe('Timeout after 10ms waiting for response to: *OPC?');
      }
    });

    it('fails before the port is opened', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600 });

      const result = await transport.query('*IDN?');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Port not opened');
      }
    });

    it('fails after the port closes underneath it', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600 });
      await transport.open();

      currentPort().emit('close');

      const result = await transport.query('*IDN?');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('SERIAL_PORT_DISCONNECTED: Port closed');
      }
      expect(transport.isOpen()).toBe(false);
    });
  });

  describe('write()', () => {
    it('sends the command without waiting for a reply', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600, commandDelay: 0 });
      await transport.open();

      const result = await transport.write('OUTP OFF');

      expect(result.ok).toBe(true);
      expect(currentPort().write).toHaveBeenCalledWith('OUTP OFF\n', expect.any(Function));
    });

    it('maps a write failure to an io TransportError', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600, commandDelay: 0 });
      await transport.open();
      currentPort().write.mockImplementationOnce((_data: string, cb: Callback) => cb(new Error('write failed')));

      const result = await transport.write('OUTP OFF');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe('io');
        expect(result.error.message).toBe('write failed');
      }
    });

    it('reports disconnection after an error event', async () => {
      const transport = createSerialTransport({ path: '/dev/ttyUSB0', baudRate: 9600 });
      await transport.open();

      currentPort().emit('error', new Error('USB cable unplugged'));

      expect(transport.isOpen()).toBe(false);
      const result = await transport.write('OUTP OFF');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('USB cable unplugged');
      }
    });
  });
});
