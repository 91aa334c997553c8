import { describe, it, expect } from 'vitest';
import { assertSpreadsheetLibrary, missingCapabilities, withSpreadsheetLibrary, type SpreadsheetSession } from './environment.js';
import { EnvironmentDependencyUnavailableError } from './errors.js';

describe('missingCapabilities', () => {
  it('lists what stand-in libraries lack', () => {
    expect(missingCapabilities({ xlsx: { read: () => null, utils: { encode_cell: () => 'A1' } }, exceljs: {} })).toEqual([
      'xlsx.utils.decode_range', 'exceljs.Workbook'
    ]);
  });

  it('rejects libraries without the needed functions', () => {
    expect(() => assertSpreadsheetLibrary({ xlsx: {}, exceljs: {} })).toThrow(EnvironmentDependencyUnavailableError);
    expect(() => assertSpreadsheetLibrary({ xlsx: {}, exceljs: {} }))
      .toThrow('Spreadsheet library is missing: xlsx.read, xlsx.utils.encode_cell, xlsx.utils.decode_range, exceljs.Workbook');
  });
});

describe('withSpreadsheetLibrary', () => {
  it('hands out a session that ends with the scope', async () => {
    const session = await withSpreadsheetLibrary(s => {
      expect(typeof s.xlsx.read).toBe('function');
      expect(typeof s.exceljs.Workbook).toBe('function');
      return s;
    });
    expect(() => session.xlsx).toThrow(EnvironmentDependencyUnavailableError);
    expect(() => session.exceljs).toThrow(EnvironmentDependencyUnavailableError);
  });

  it('keeps the session open until an async scope settles', async () => {
    const read = await withSpreadsheetLibrary(async s => {
      await Promise.resolve();
      return typeof s.xlsx.read;
    });
    expect(read).toBe('function');
  });

  it('releases the session when the scope throws', async () => {
    let held: SpreadsheetSession | undefined;
    await expect(withSpreadsheetLibrary(s => {
      held = s;
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(() => held?.xlsx).toThrow('Spreadsheet session already released');
  });
});
