export type FlagValue = string | boolean

export interface ParsedCommandLine {
  positionals: string[]
  flags: Record<string, FlagValue>
}

/**
 * Split argv into positionals and `--flag` values.
 *
 * A value flag takes every following token up to the next `--flag`, joined
 * with spaces, so `--sites ebay walmart` reads as "ebay walmart". Flags in
 * `booleanFlags` never take a value; tokens after them are positionals.
 * A value flag with no tokens after it reads as `true`.
 */
export function parseCommandLine(argv: string[], booleanFlags: ReadonlySet<string> = new Set()): ParsedCommandLine {
  const positionals: string[] = []
  const flags: Record<string, FlagValue> = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      positionals.push(token)
      continue
    }

    const key = token.slice(2)
    if (booleanFlags.has(key)) {
      flags[key] = true
      continue
    }

    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return { positionals, flags }
}
