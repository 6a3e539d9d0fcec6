import { describe, it, expect } from 'vitest';
import { LineSplitter } from './lineSplitter';

describe('LineSplitter', () => {
  it('splits on newlines and keeps the trailing partial line', () => {
    const splitter = new LineSplitter();

    expect(splitter.push('esptool.py v4.7.0\nSerial port /dev/tty')).toEqual(['esptool.py v4.7.0']);
    expect(splitter.push('USB0\n')).toEqual(['Serial port /dev/ttyUSB0']);
  });

  it('treats carriage returns as line ends for progress redraws', () => {
    const splitter = new LineSplitter();

    expect(splitter.push('Writing at 0x00010000... (10 %)\rWriting at 0x00014000... (20 %)\r')).toEqual([
      'Writing at 0x00010000... (10 %)',
      'Writing at 0x00014000... (20 %)',
    ]);
  });

  it('handles a CRLF split across chunks without an empty line', () => {
    const splitter = new LineSplitter();

    expect(splitter.push('Connecting...\r')).toEqual(['Connecting...']);
    expect(splitter.push('\nChip is ESP32-S3\r\n')).toEqual(['Chip is ESP32-S3']);
  });

  it('drops blank lines and trailing whitespace', () => {
    const splitter = new LineSplitter();
    expect(splitter.push('Hard resetting via RTS pin...   \n\n\n')).toEqual(['Hard resetting via RTS pin...']);
  });

  it('flush returns the unterminated remainder once', () => {
    const splitter = new LineSplitter();
    splitter.push('Leaving...');

    expect(splitter.flush()).toEqual(['Leaving...']);
    expect(splitter.flush()).toEqual([]);
  });
});
