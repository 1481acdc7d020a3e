import { InvalidArmorFormatError } from '../lib/errors.js';

export type ArmorType = 'PUBLIC KEY BLOCK' | 'PRIVATE KEY BLOCK' | 'MESSAGE';

export interface ArmorBlock {
  /** Text between `-----BEGIN PGP ` and the trailing `-----` of the header */
  type: string;
  /** Base64 payload with line breaks removed */
  data: string;
}

const BEGIN_PREFIX = '-----BEGIN PGP ';
const END_PREFIX = '-----END PGP ';
const DASHES = '-----';
const LINE_LENGTH = 64;

export function createArmor(data: string, type: ArmorType): string {
  const lines: string[] = [];
  for (let i = 0; i < data.length; i += LINE_LENGTH) {
    lines.push(data.substring(i, i + LINE_LENGTH));
  }

  return `${BEGIN_PREFIX}${type}${DASHES}\n\n${lines.join('\n')}\n${END_PREFIX}${type}${DASHES}`;
}

export function parseArmor(armored: string): ArmorBlock {
  const lines = armored.trim().split('\n').map(line => line.replace(/\r$/, ''));

  let headerIndex = -1;
  let footerIndex = -1;
  let type = '';

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (headerIndex === -1) {
      if (line.startsWith(BEGIN_PREFIX)) {
        if (!line.endsWith(DASHES) || line.length < BEGIN_PREFIX.length + DASHES.length + 1) {
          throw new InvalidArmorFormatError('Malformed armor header line');
        }
        headerIndex = i;
        type = line.slice(BEGIN_PREFIX.length, -DASHES.length);
      }
    } else if (line.startsWith(END_PREFIX)) {
      footerIndex = i;
      break;
    }
  }

  if (headerIndex === -1) {
    throw new InvalidArmorFormatError('Missing armor header');
  }
  if (footerIndex === -1) {
    throw new InvalidArmorFormatError('Missing armor footer');
  }

  const data = lines
    .slice(headerIndex + 1, footerIndex)
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('');

  return { type, data };
}
