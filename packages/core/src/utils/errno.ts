/** True when `err` is a Node system error carrying the given `code`. */
export function hasErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
