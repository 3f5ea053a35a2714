/**
 * Wire-level message types exchanged with mtr-packet
 */

export type ArgumentValue = string | number | boolean;

/**
 * A verb plus its ordered arguments, before a token is attached
 */
export type Command = {
  verb: string;
  args: ReadonlyArray<readonly [name: string, value: ArgumentValue]>;
};

/**
 * A decoded reply line. Field values are kept as raw strings;
 * consumers coerce them to the type they expect.
 */
export type Reply = {
  readonly token: number;
  readonly keyword: string;
  readonly fields: ReadonlyMap<string, string>;
};

/**
 * How arguments are laid out on a line
 * - assign: `name=value`
 * - pairs: `name value` (the native mtr-packet form)
 */
export type WireSyntax = 'assign' | 'pairs';
