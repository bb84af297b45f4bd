/**
 * keyring2kdbx CLI - Colors
 *
 * Raw ANSI escapes, disabled by NO_COLOR or when stderr is not a terminal
 * (FORCE_COLOR turns them back on).
 */

/**
 * Whether escapes are emitted for the given environment and stream
 */
export function isColorEnabled(env: NodeJS.ProcessEnv = process.env, isTTY = process.stderr.isTTY ?? false): boolean {
  // Respect NO_COLOR standard
  if (env.NO_COLOR !== undefined) return false
  if (env.FORCE_COLOR !== undefined) return true
  return isTTY
}

const enabled = isColorEnabled()

const wrap = (open: string, close: string) => (s: string): string => enabled ? `\x1b[${open}m${s}\x1b[${close}m` : s

const ansi = {
  dim: wrap('2', '22'),
  red: wrap('91', '39')
}

// Semantic colors
export const c = {
  error: (text: string) => ansi.red(text),
  muted: (text: string) => ansi.dim(text)
}

export const symbols = {
  error: enabled ? ansi.red('✗') : '[ERROR]'
}

// Status lines go to stderr so stdout only carries results
export const print = {
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`)
}
