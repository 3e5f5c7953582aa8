import { createLogger } from './logger.js';

const stripAnsi = (text: string): string => text.replace(/\x1b\[[0-9;]*m/g, '');

describe('createLogger', () => {
  it('writes nothing unless verbose', () => {
    const write = jest.fn();
    createLogger({ write }).debug('Skipping delim at top level');
    expect(write).not.toHaveBeenCalled();
  });

  it('writes debug lines with their metadata when verbose', () => {
    const write = jest.fn();
    createLogger({ verbose: true, write }).debug("Skipping close-curly '}' at top level", {
      span: { start: 0, end: 1 },
    });

    expect(write).toHaveBeenCalledTimes(1);
    expect(stripAnsi(String(write.mock.calls[0]?.[0]))).toBe(
      `[debug] Skipping close-curly '}' at top level span={"start":0,"end":1}`
    );
  });

  it('writes a bare message without metadata', () => {
    const write = jest.fn();
    createLogger({ verbose: true, write }).debug('done');
    expect(stripAnsi(String(write.mock.calls[0]?.[0]))).toBe('[debug] done');
  });
});
