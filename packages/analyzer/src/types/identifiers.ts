/**
 * Contract and trait identities
 */

/** Issuer used for contracts deployed in a local, transient session */
export const TRANSIENT_ISSUER = "S1G2081040G2081040G2081040G208105NK8PE5";

export const CONTRACT_NAME_MAX_LENGTH = 40;

const CONTRACT_NAME_PATTERN = /^[a-zA-Z]([a-zA-Z0-9]|[-_])*$/;
const ISSUER_PATTERN = /^[0-9A-Z]{28,41}$/;

export const isContractName = (name: string): boolean =>
  name.length <= CONTRACT_NAME_MAX_LENGTH && CONTRACT_NAME_PATTERN.test(name);

export const isIssuer = (issuer: string): boolean =>
  ISSUER_PATTERN.test(issuer);

const compareStrings = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

export class QualifiedContractIdentifier {
  constructor(
    public readonly issuer: string,
    public readonly name: string,
  ) {}

  static local(name: string): QualifiedContractIdentifier {
    return new QualifiedContractIdentifier(TRANSIENT_ISSUER, name);
  }

  /**
   * Parses `ISSUER.contract-name`; undefined if either part is malformed
   */
  static parse(text: string): QualifiedContractIdentifier | undefined {
    const dot = text.indexOf(".");
    if (dot < 0) {
      return undefined;
    }
    const issuer = text.slice(0, dot);
    const name = text.slice(dot + 1);
    if (!isIssuer(issuer) || !isContractName(name)) {
      return undefined;
    }
    return new QualifiedContractIdentifier(issuer, name);
  }

  equals(other: QualifiedContractIdentifier): boolean {
    return this.issuer === other.issuer && this.name === other.name;
  }

  toString(): string {
    return `${this.issuer}.${this.name}`;
  }
}

export class TraitIdentifier {
  constructor(
    public readonly contractIdentifier: QualifiedContractIdentifier,
    public readonly name: string,
  ) {}

  equals(other: TraitIdentifier): boolean {
    return (
      this.name === other.name &&
      this.contractIdentifier.equals(other.contractIdentifier)
    );
  }

  toString(): string {
    return `${this.contractIdentifier.toString()}.${this.name}`;
  }

  /**
   * Orders by issuer, then contract name, then trait name
   */
  static compare(a: TraitIdentifier, b: TraitIdentifier): number {
    const left = a.contractIdentifier;
    const right = b.contractIdentifier;
    return (
      compareStrings(left.issuer, right.issuer) ||
      compareStrings(left.name, right.name) ||
      compareStrings(a.name, b.name)
    );
  }
}
