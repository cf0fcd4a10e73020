import { describe, it, expect } from 'vitest';
import { UsageError, parseArgs } from '../args.js';

describe('parseArgs', () => {
  it('defaults to help with the standard settings', () => {
    expect(parseArgs([])).toEqual({
      command: 'help',
      pot: '0',
      cost: 20,
      iterations: 10000,
      format: 'table',
      cards: []
    });
  });

  it('reads the odds command and its options', () => {
    const options = parseArgs([
      'odds', '--hole', 'As Ks', '--board', 'Qs Js ? ? ?', '--pot', '150',
      '--cost', '12.5', '-i', '2000', '-s', '42', '-f', 'json', '-o', 'out/result.json'
    ]);
    expect(options).toEqual({
      command: 'odds',
      hole: 'As Ks',
      board: 'Qs Js ? ? ?',
      pot: '150',
      cost: 12.5,
      iterations: 2000,
      seed: 42,
      format: 'json',
      output: 'out/result.json',
      cards: []
    });
  });

  it('keeps the pot as raw text for later coercion', () => {
    expect(parseArgs(['odds', '-p', 'lots']).pot).toBe('lots');
  });

  it('collects positional cards for evaluate', () => {
    const options = parseArgs(['eval', 'As', 'Ks', 'Qs', 'Js', 'Ts']);
    expect(options.command).toBe('evaluate');
    expect(options.cards).toEqual(['As', 'Ks', 'Qs', 'Js', 'Ts']);
  });

  it('recognizes version flags', () => {
    expect(parseArgs(['-v']).command).toBe('version');
    expect(parseArgs(['--version']).command).toBe('version');
  });

  it('rejects bad option values', () => {
    expect(() => parseArgs(['odds', '-i', 'many'])).toThrow('Invalid value for -i: many');
    expect(() => parseArgs(['odds', '--cost', ''])).toThrow(UsageError);
    expect(() => parseArgs(['odds', '--cost', '-5'])).toThrow('Invalid value for --cost: -5');
    expect(() => parseArgs(['odds', '-i', ''])).toThrow('Invalid value for -i: ');
    expect(() => parseArgs(['odds', '-i', '0x10'])).toThrow('Invalid value for -i: 0x10');
    expect(() => parseArgs(['odds', '-i', '0'])).toThrow('Invalid value for -i: 0');
    expect(() => parseArgs(['odds', '-s', '0b11'])).toThrow(UsageError);
    expect(() => parseArgs(['odds', '-f', 'xml'])).toThrow('Invalid format: xml. Supported: table, json, html');
    expect(() => parseArgs(['odds', '--hole'])).toThrow('Missing value for --hole');
    expect(() => parseArgs(['odds', '--fast'])).toThrow('Unknown option: --fast');
  });
});
