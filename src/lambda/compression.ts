import { gzipSync } from 'node:zlib'
import { ENCODING_GZIP, HEADER_ACCEPT_ENCODING } from '../lib/constants.js'
import { get_header } from './headers.js'
import type { ProxyHeaders } from './types.js'

/**
 * Whether the client listed gzip in Accept-Encoding. Each entry is
 * compared by its coding token; a q-value of zero opts out.
 */
export function accepts_gzip(headers: ProxyHeaders): boolean {
  const accept_encoding = get_header(headers, HEADER_ACCEPT_ENCODING)
  if (accept_encoding === undefined) return false

  return accept_encoding
    .trim()
    .split(/\s*,\s*/)
    .some((entry) => {
      const [coding, ...params] = entry.split(';').map((part) => part.trim())
      if (coding.toLowerCase() !== ENCODING_GZIP) return false
      return !params.some((param) => /^q\s*=\s*0(\.0{0,3})?$/i.test(param))
    })
}

// gzip container over the UTF-8 bytes, returned as base64 text
export function gzip_body(body: string): string {
  return gzipSync(Buffer.from(body, 'utf-8')).toString('base64')
}
