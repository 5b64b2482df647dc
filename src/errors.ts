/**
 * Error kinds raised while reading a compressed container.
 *
 * - `InvalidFormat`: the data is not a container of this format or version.
 * - `CorruptedStream`: the header or body is internally inconsistent.
 * - `UnsupportedAlphabetSize`: the header declares more than 256 symbols.
 */
export type HuffmanErrorKind =
  | 'InvalidFormat'
  | 'CorruptedStream'
  | 'UnsupportedAlphabetSize';

export class HuffmanError extends Error {
  readonly kind: HuffmanErrorKind;

  constructor(kind: HuffmanErrorKind, message: string) {
    super(message);
    this.name = 'HuffmanError';
    this.kind = kind;
  }
}

export function isHuffmanError(error: unknown): error is HuffmanError {
  return error instanceof HuffmanError;
}
