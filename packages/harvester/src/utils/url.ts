import { createLogger } from '@workspace/logger'
import { parse as parseDomain } from 'psl'

const log = createLogger('url')

/** Registrable domain of a URL (`groups.example.co.uk` gives `example.co.uk`), or '' when there is none. */
export const extractDomain = (url: string): string => {
  if (url.trim().length === 0) {
    return ''
  }

  const withScheme = /^https?:\/\//i.test(url) ? url : `https://${url}`

  let hostname: string
  try {
    hostname = new URL(withScheme).hostname
  } catch {
    log.debug('Not a URL, no domain to extract', { url })
    return ''
  }

  const parsed = parseDomain(hostname)
  if (!('listed' in parsed)) {
    log.debug('Hostname has no registrable domain', { url, error: parsed.error })
    return ''
  }

  return parsed.domain ?? ''
}

/** Both URLs belong to the same registrable domain. */
export const domainMatches = (url: string, target: string): boolean => {
  const domain = extractDomain(url)
  return domain !== '' && domain === extractDomain(target)
}
