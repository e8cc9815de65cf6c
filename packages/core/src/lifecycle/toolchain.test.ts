import { describe, it, expect } from 'vitest';
import { toolchainFingerprint } from './toolchain';

describe('toolchainFingerprint', () => {
  const base = {
    command: 'cythonize',
    args: ['-3', '{source}'],
    directives: { boundscheck: false, cdivision: true },
  };

  it('prefixes the compiler version to a 12 character digest', () => {
    expect(toolchainFingerprint('3.0.10', base)).toMatch(/^3\.0\.10\+[0-9a-f]{12}$/);
  });

  it('ignores directive order', () => {
    const reordered = { ...base, directives: { cdivision: true, boundscheck: false } };
    expect(toolchainFingerprint('3.0.10', reordered)).toBe(toolchainFingerprint('3.0.10', base));
  });

  it('changes with any setting that affects the output', () => {
    const reference = toolchainFingerprint('3.0.10', base);
    expect(toolchainFingerprint('3.0.11', base)).not.toBe(reference);
    expect(toolchainFingerprint('3.0.10', { ...base, args: ['-2', '{source}'] })).not.toBe(
      reference,
    );
    expect(
      toolchainFingerprint('3.0.10', { ...base, directives: { ...base.directives, cdivision: false } }),
    ).not.toBe(reference);
  });
});
