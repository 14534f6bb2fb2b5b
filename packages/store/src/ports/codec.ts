/**
 * Bidirectional transform between a typed value and its stored text form.
 *
 * @remarks
 * `decode` must reject input that does not describe a valid `T` rather than
 * return a partially filled value.
 */
export interface Codec<T> {
  encode(value: T): string
  decode(text: string): T
}
