import { classify, isSatisfied, matches } from '../src/versions';

describe('Version matching', () => {
  describe('matches', () => {
    test.each(['1.0.0', '4.17.21', '15.0.0-canary.12', '1', '0.0.0+build.7'])(
      'should match %s against itself',
      (version) => {
        expect(matches(version, version)).toBe(true);
        expect(matches(version, version, 'exact')).toBe(true);
      },
    );

    test('should treat a shorter spec as a segment prefix', () => {
      expect(matches('1.0.5', '1.0')).toBe(true);
      expect(matches('1.0.5', '1')).toBe(true);
      expect(matches('1.10.0', '1.0')).toBe(false);
      expect(matches('1.0.5', '1.0.')).toBe(false);
    });

    test('should compare every segment of an equal-length spec', () => {
      expect(matches('2.0.0', '2.0.1')).toBe(false);
      expect(matches('1.0.0', '1.0.0')).toBe(true);
    });

    test('should never match a spec longer than the found version', () => {
      expect(matches('1.0', '1.0.0')).toBe(false);
    });

    test('should require equal segment counts in exact mode', () => {
      expect(matches('1.0.5', '1.0', 'exact')).toBe(false);
      expect(matches('18.3.1', '18', 'exact')).toBe(false);
    });
  });

  describe('classify', () => {
    test('should report every spec satisfied', () => {
      expect(classify(['1.0.0', '1.0'], ['1.0.0'])).toBe('all');
    });

    test('should report a partial match', () => {
      expect(classify(['1.0.0', '1.0.1'], ['1.0.0'])).toBe('some');
    });

    test('should report no spec satisfied', () => {
      expect(classify(['1.0.0'], ['2.0.0'])).toBe('none');
    });

    test('should honor exact mode', () => {
      expect(classify(['18'], ['18.3.1'], 'exact')).toBe('none');
      expect(classify(['18'], ['18.3.1'])).toBe('all');
    });
  });

  test('isSatisfied should look at every found version', () => {
    expect(isSatisfied('4.17.21', ['4.17.20', '4.17.21'])).toBe(true);
    expect(isSatisfied('4.17.19', ['4.17.20', '4.17.21'])).toBe(false);
  });
});
