export const DEV_LOG =
  process.env.NODE_ENV === 'development' ||
  process.env.DEV_LOG === '1' ||
  process.env.DEV_LOG === 'true' ||
  !!process.env.TEST

export function debug(...args: unknown[]) {
  if (DEV_LOG) console.debug('[debug]', ...args)
}

export function info(...args: unknown[]) {
  console.info('[info]', ...args)
}

export function warn(...args: unknown[]) {
  console.warn('[warn]', ...args)
}

export function error(...args: unknown[]) {
  console.error('[error]', ...args)
}

/**
 * Scoped logger that prefixes every line with the component name, e.g. `[classify]`.
 */
export function scoped(scope: string) {
  const tag = `[${scope}]`
  return {
    debug: (...args: unknown[]) => debug(tag, ...args),
    info: (...args: unknown[]) => info(tag, ...args),
    warn: (...args: unknown[]) => warn(tag, ...args),
    error: (...args: unknown[]) => error(tag, ...args)
  }
}

export type Logger = ReturnType<typeof scoped>
