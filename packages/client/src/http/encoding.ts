const ALWAYS_SAFE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789_.-~';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

function hexByte(byte: number): string {
  return '%' + byte.toString(16).toUpperCase().padStart(2, '0');
}

/** Percent-encode UTF-8 bytes, leaving unreserved characters and `safe` untouched. */
export function quote(value: string, safe = ''): string {
  let out = '';
  for (const byte of encoder.encode(value)) {
    const ch = String.fromCharCode(byte);
    if (byte < 0x80 && (ALWAYS_SAFE.includes(ch) || safe.includes(ch))) {
      out += ch;
    } else {
      out += hexByte(byte);
    }
  }
  return out;
}

/** Form-style quoting: spaces become `+`. */
export function quotePlus(value: string, safe = ''): string {
  if (!value.includes(' ')) return quote(value, safe);
  return quote(value, safe + ' ').replace(/ /g, '+');
}

/** Decode %XX runs as UTF-8; malformed escapes are left as they are. */
export function unquote(value: string): string {
  if (!value.includes('%')) return value;
  return value.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) => {
    const bytes = new Uint8Array(run.length / 3);
    for (let i = 0; i < bytes.length; i += 1) {
      bytes[i] = Number.parseInt(run.slice(i * 3 + 1, i * 3 + 3), 16);
    }
    return decoder.decode(bytes);
  });
}

export function unquotePlus(value: string): string {
  return unquote(value.replace(/\+/g, ' '));
}

/**
 * Encode a query value unless it already looks encoded: a value that changes
 * when decoded is passed through untouched.
 */
export function encodeParamValue(value: string, opts: { safe?: string; plus?: boolean } = {}): string {
  const safe = opts.safe ?? '';
  const encode = opts.plus ? quotePlus : quote;
  const decode = opts.plus ? unquotePlus : unquote;
  return decode(value) === value ? encode(value, safe) : value;
}
