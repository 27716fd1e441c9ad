import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { FQName, compareFQNames, sortedUnique } from './fqname.js';

const fqNameArb = fc
  .tuple(
    fc.constantFrom('a', 'a.b', 'b', 'vendor.acme.nfc'),
    fc.integer({ min: 0, max: 3 }),
    fc.integer({ min: 0, max: 3 }),
    fc.constantFrom('', 'IFoo', 'IBar', 'types', 'types.Point')
  )
  .map(([pkg, major, minor, name]) => new FQName(pkg, major, minor, name));

describe('FQName', () => {
  describe('parse', () => {
    it('should parse a bare package', () => {
      const name = FQName.parse('vendor.acme.nfc@1.0');

      expect(name).toBeDefined();
      expect(name?.package).toBe('vendor.acme.nfc');
      expect(name?.major).toBe(1);
      expect(name?.minor).toBe(0);
      expect(name?.name).toBe('');
      expect(name?.isFullyQualified()).toBe(false);
      expect(name?.isPackage()).toBe(true);
    });

    it('should parse a unit with a nested type', () => {
      const name = FQName.parse('vendor.acme.nfc@2.11::types.Point');

      expect(name?.version()).toBe('2.11');
      expect(name?.name).toBe('types.Point');
      expect(name?.unitName()).toBe('types');
      expect(name?.nestedName()).toBe('Point');
      expect(name?.isFullyQualified()).toBe(true);
      expect(name?.unit().string()).toBe('vendor.acme.nfc@2.11::types');
    });

    it('should reject malformed names', () => {
      expect(FQName.parse('vendor.acme.nfc')).toBeUndefined();
      expect(FQName.parse('@1.0::IFoo')).toBeUndefined();
      expect(FQName.parse('vendor.acme@1::IFoo')).toBeUndefined();
      expect(FQName.parse('vendor.acme@1.0::')).toBeUndefined();
      expect(FQName.parse('vendor..acme@1.0')).toBeUndefined();
      expect(FQName.parse('vendor.acme@1.0::IFoo..Bar')).toBeUndefined();
    });

    it('should reject version components too long to compare exactly', () => {
      expect(FQName.parse('vendor.acme@123456789.0')?.major).toBe(123456789);
      expect(FQName.parse('vendor.acme@1234567890.0')).toBeUndefined();
      expect(FQName.parse('vendor.acme@1.9007199254740993::IFoo')).toBeUndefined();
    });

    it('should round-trip the canonical string', () => {
      fc.assert(
        fc.property(fqNameArb, (name) => {
          expect(FQName.parse(name.string())?.equals(name)).toBe(true);
        })
      );
    });
  });

  describe('derived names', () => {
    const name = new FQName('vendor.acme.nfc', 1, 0, 'INfc');

    it('should derive language-specific names', () => {
      expect(name.sanitizedVersion()).toBe('V1_0');
      expect(name.tokenName()).toBe('vendor_acme_nfc_V1_0');
      expect(name.javaPackage()).toBe('vendor.acme.nfc.V1_0');
      expect(name.cppNamespace()).toBe('::vendor::acme::nfc::V1_0');
      expect(name.cppName()).toBe('::vendor::acme::nfc::V1_0::INfc');
      expect(name.withName('INfc.Info').cppName()).toBe('::vendor::acme::nfc::V1_0::INfc::Info');
      expect(name.javaName()).toBe('vendor.acme.nfc.V1_0.INfc');
    });

    it('should derive interface helper names', () => {
      expect(name.interfaceBaseName()).toBe('Nfc');
      expect(name.interfaceHwName()).toBe('IHwNfc');
      expect(name.interfaceStubName()).toBe('BnHwNfc');
      expect(name.interfaceProxyName()).toBe('BpHwNfc');
      expect(name.interfacePassthroughName()).toBe('BsNfc');
      expect(name.interfaceAdapterFqName().string()).toBe('vendor.acme.nfc@1.0::ANfc');
    });

    it('should match package prefixes on whole components', () => {
      expect(name.inPackage('vendor.acme')).toBe(true);
      expect(name.inPackage('vendor.acme.nfc')).toBe(true);
      expect(name.inPackage('vendor.ac')).toBe(false);
    });

    it('should derive package and types names', () => {
      expect(name.packageAndVersion().string()).toBe('vendor.acme.nfc@1.0');
      expect(name.typesForPackage().string()).toBe('vendor.acme.nfc@1.0::types');
      expect(name.typesForPackage().isTypes()).toBe(true);
    });
  });

  describe('ordering', () => {
    it('should treat names as equal iff their tuples are equal', () => {
      fc.assert(
        fc.property(fqNameArb, fqNameArb, (a, b) => {
          const sameTuple =
            a.package === b.package &&
            a.major === b.major &&
            a.minor === b.minor &&
            a.name === b.name;
          expect(a.equals(b)).toBe(sameTuple);
          expect(a.string() === b.string()).toBe(sameTuple);
        })
      );
    });

    it('should be antisymmetric', () => {
      fc.assert(
        fc.property(fqNameArb, fqNameArb, (a, b) => {
          expect(Math.sign(compareFQNames(a, b))).toBe(-Math.sign(compareFQNames(b, a)));
        })
      );
    });

    it('should be transitive', () => {
      fc.assert(
        fc.property(fqNameArb, fqNameArb, fqNameArb, (a, b, c) => {
          if (compareFQNames(a, b) <= 0 && compareFQNames(b, c) <= 0) {
            expect(compareFQNames(a, c)).toBeLessThanOrEqual(0);
          }
        })
      );
    });

    it('should compare versions numerically', () => {
      const older = new FQName('a', 1, 9);
      const newer = new FQName('a', 1, 10);

      expect(compareFQNames(older, newer)).toBeLessThan(0);
    });

    it('should sort and deduplicate', () => {
      const names = [
        new FQName('b', 1, 0),
        new FQName('a', 2, 0, 'IFoo'),
        new FQName('a', 2, 0),
        new FQName('b', 1, 0),
      ];

      expect(sortedUnique(names).map((n) => n.string())).toEqual([
        'a@2.0',
        'a@2.0::IFoo',
        'b@1.0',
      ]);
    });
  });
});
