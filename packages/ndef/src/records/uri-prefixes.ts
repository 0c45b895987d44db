/**
 * URI identifier codes from the NFC Forum URI Record Type Definition.
 * The index is the code written as the first payload byte.
 */
export const URI_PREFIXES: readonly string[] = [
  '',
  'http://www.',
  'https://www.',
  'http://',
  'https://',
  'tel:',
  'mailto:',
  'ftp://anonymous:anonymous@',
  'ftp://ftp.',
  'ftps://',
  'sftp://',
  'smb://',
  'nfs://',
  'ftp://',
  'dav://',
  'news:',
  'telnet://',
  'imap:',
  'rtsp://',
  'urn:',
  'pop:',
  'sip:',
  'sips:',
  'tftp:',
  'btspp://',
  'btl2cap://',
  'btgoep://',
  'tcpobex://',
  'irdaobex://',
  'file://',
  'urn:epc:id:',
  'urn:epc:tag:',
  'urn:epc:pat:',
  'urn:epc:raw:',
  'urn:epc:',
  'urn:nfc:',
];

/**
 * Picks the code whose prefix is the longest match for `uri`.
 * Code 0 (no abbreviation) matches everything.
 */
export function selectUriPrefix(uri: string): number {
  let best = 0;
  for (let code = 1; code < URI_PREFIXES.length; code++) {
    const prefix = URI_PREFIXES[code] ?? '';
    if (
      uri.startsWith(prefix) &&
      prefix.length > (URI_PREFIXES[best] ?? '').length
    ) {
      best = code;
    }
  }
  return best;
}
