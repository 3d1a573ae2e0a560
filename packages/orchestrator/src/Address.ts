import { ValidationError } from '@netform/contracts';

const KIND = /^[a-z][\d_a-z]*$/;
const NAME = /^[\w-]+$/;

/** `<kind>.<name>`: where a resource lives in the desired-state document and in state */
export class Address {
  constructor(
    public readonly kind: string,
    public readonly name: string
  ) {}

  static parse(input: string): Address {
    const dot = input.indexOf('.');
    const kind = dot === -1 ? '' : input.slice(0, dot);
    const name = dot === -1 ? '' : input.slice(dot + 1);

    if (!KIND.test(kind) || !NAME.test(name)) throw new ValidationError(`Invalid address format: ${input} (expected kind.name)`);
    return new Address(kind, name);
  }

  toString(): string {
    return `${this.kind}.${this.name}`;
  }

  equals(other: Address): boolean {
    return this.toString() === other.toString();
  }
}
