/**
 * Fully-qualified names for packages, units and nested types.
 *
 * The textual form is `package@major.minor` for a bare package and
 * `package@major.minor::Name` (optionally `Name.Nested`) for a unit or a type
 * declared inside a unit.
 *
 * @packageDocumentation
 */

/** Name of the pseudo-unit holding a package's shared type declarations. */
export const TYPES_UNIT = 'types';

const PACKAGE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;
/** Components stay well inside the safe integer range. */
const VERSION_PATTERN = /^(\d{1,9})\.(\d{1,9})$/;
const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * Immutable package/version/name identifier.
 *
 * Equality and ordering are defined over the `(package, major, minor, name)`
 * tuple; see {@link compareFQNames}.
 */
export class FQName {
  readonly package: string;
  readonly major: number;
  readonly minor: number;
  /** Unit name with an optional nested type suffix, empty for a bare package. */
  readonly name: string;

  constructor(pkg: string, major: number, minor: number, name = '') {
    this.package = pkg;
    this.major = major;
    this.minor = minor;
    this.name = name;
  }

  /**
   * Parses the textual form of a name.
   *
   * @param text - `pkg@M.m` or `pkg@M.m::Name[.Nested]`.
   * @returns The parsed name, or `undefined` if the text is malformed.
   */
  static parse(text: string): FQName | undefined {
    const at = text.indexOf('@');
    if (at <= 0) {
      return undefined;
    }
    const pkg = text.slice(0, at);
    const rest = text.slice(at + 1);
    const sep = rest.indexOf('::');
    const versionText = sep === -1 ? rest : rest.slice(0, sep);
    const name = sep === -1 ? '' : rest.slice(sep + 2);

    if (!PACKAGE_PATTERN.test(pkg)) {
      return undefined;
    }
    const version = VERSION_PATTERN.exec(versionText);
    if (version === null) {
      return undefined;
    }
    if (sep !== -1 && !NAME_PATTERN.test(name)) {
      return undefined;
    }
    return new FQName(pkg, Number(version[1]), Number(version[2]), name);
  }

  /** `M.m` */
  version(): string {
    return `${String(this.major)}.${String(this.minor)}`;
  }

  /** `VM_m`, usable as an identifier. */
  sanitizedVersion(): string {
    return `V${String(this.major)}_${String(this.minor)}`;
  }

  /** Canonical textual form; the cache key for units. */
  string(): string {
    const base = `${this.package}@${this.version()}`;
    return this.name === '' ? base : `${base}::${this.name}`;
  }

  toString(): string {
    return this.string();
  }

  /** True when package, version and name are all present. */
  isFullyQualified(): boolean {
    return this.package !== '' && this.name !== '';
  }

  /** True for a bare `pkg@M.m`. */
  isPackage(): boolean {
    return this.name === '';
  }

  /** The unit part of the name: `types.Point` → `types`. */
  unitName(): string {
    const dot = this.name.indexOf('.');
    return dot === -1 ? this.name : this.name.slice(0, dot);
  }

  /** The nested part of the name: `types.Point` → `Point`, empty otherwise. */
  nestedName(): string {
    const dot = this.name.indexOf('.');
    return dot === -1 ? '' : this.name.slice(dot + 1);
  }

  /** This name reduced to its unit. */
  unit(): FQName {
    return this.withName(this.unitName());
  }

  packageAndVersion(): FQName {
    return this.withName('');
  }

  typesForPackage(): FQName {
    return this.withName(TYPES_UNIT);
  }

  withName(name: string): FQName {
    return new FQName(this.package, this.major, this.minor, name);
  }

  isTypes(): boolean {
    return this.unitName() === TYPES_UNIT;
  }

  equals(other: FQName): boolean {
    return compareFQNames(this, other) === 0;
  }

  /** True if both names denote the same package and version. */
  samePackage(other: FQName): boolean {
    return (
      this.package === other.package && this.major === other.major && this.minor === other.minor
    );
  }

  /**
   * Checks whether this name lives under a package prefix, matching whole
   * dot-separated components.
   */
  inPackage(prefix: string): boolean {
    return this.package === prefix || this.package.startsWith(prefix + '.');
  }

  packageComponents(): string[] {
    return this.package.split('.');
  }

  /** `vendor_acme_nfc_V1_0` */
  tokenName(): string {
    return [...this.packageComponents(), this.sanitizedVersion()].join('_');
  }

  /** `vendor.acme.nfc.V1_0` */
  javaPackage(): string {
    return `${this.package}.${this.sanitizedVersion()}`;
  }

  /** `::vendor::acme::nfc::V1_0` */
  cppNamespace(): string {
    return '::' + [...this.packageComponents(), this.sanitizedVersion()].join('::');
  }

  /** `::vendor::acme::nfc::V1_0::INfc::Info` */
  cppName(): string {
    if (this.name === '') {
      return this.cppNamespace();
    }
    return `${this.cppNamespace()}::${this.name.split('.').join('::')}`;
  }

  /** `vendor.acme.nfc.V1_0.INfc.Info` */
  javaName(): string {
    return this.name === '' ? this.javaPackage() : `${this.javaPackage()}.${this.name}`;
  }

  /** Interface name without its leading `I`: `INfc` → `Nfc`. */
  interfaceBaseName(): string {
    const unit = this.unitName();
    return unit.startsWith('I') ? unit.slice(1) : unit;
  }

  interfaceHwName(): string {
    return `IHw${this.interfaceBaseName()}`;
  }

  interfaceStubName(): string {
    return `BnHw${this.interfaceBaseName()}`;
  }

  interfaceProxyName(): string {
    return `BpHw${this.interfaceBaseName()}`;
  }

  interfacePassthroughName(): string {
    return `Bs${this.interfaceBaseName()}`;
  }

  interfaceAdapterName(): string {
    return `A${this.interfaceBaseName()}`;
  }

  interfaceAdapterFqName(): FQName {
    return this.withName(this.interfaceAdapterName());
  }
}

/**
 * Total order over `(package, major, minor, name)`.
 *
 * @returns Negative, zero or positive like `Array.prototype.sort` expects.
 */
export function compareFQNames(a: FQName, b: FQName): number {
  if (a.package !== b.package) {
    return a.package < b.package ? -1 : 1;
  }
  if (a.major !== b.major) {
    return a.major - b.major;
  }
  if (a.minor !== b.minor) {
    return a.minor - b.minor;
  }
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }
  return 0;
}

/**
 * Returns the distinct names of a collection in ascending order.
 */
export function sortedUnique(names: Iterable<FQName>): FQName[] {
  const byKey = new Map<string, FQName>();
  for (const name of names) {
    byKey.set(name.string(), name);
  }
  return [...byKey.values()].sort(compareFQNames);
}
