import { isIP } from 'node:net';
import { HeaderValue, ParsedMail, simpleParser, SimpleParserOptions } from 'mailparser';

export interface ParsedMessage {
  /** Lower-cased address from the From header, empty if absent */
  senderAddress: string;
  senderDomain: string;
  subject: string;
  /** First inline text/plain part; empty when there is none */
  body: string;
  /** Unfolded Received header values, topmost first */
  received: string[];
  /** Connecting client IP taken from the Received chain */
  senderIp?: string;
}

const RECEIVED_IP_PATTERN = /\[(?:IPv6:)?([0-9A-Fa-f:.]+)\]/g;

function isLoopback(ip: string): boolean {
  return ip === '::1' || ip.startsWith('127.');
}

/**
 * Find the client IP recorded by the receiving server.
 *
 * Headers are walked from the top (the hop closest to us); the first
 * bracketed, non-loopback address in a `from` clause wins.
 */
export function extractSenderIp(received: string[]): string | undefined {
  for (const header of received) {
    const fromClause = header.split(/\bby\b/i)[0];
    for (const match of fromClause.matchAll(RECEIVED_IP_PATTERN)) {
      const candidate = match[1];
      if (isIP(candidate) && !isLoopback(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
}

export function domainOf(address: string): string {
  const at = address.lastIndexOf('@');
  return at >= 0 ? address.slice(at + 1) : '';
}

// Bodies are taken from text/plain parts only; HTML is never converted
const PARSER_OPTIONS: SimpleParserOptions = {
  skipHtmlToText: true,
  skipTextToHtml: true,
  skipImageLinks: true,
  skipTextLinks: true,
};

interface StructuredHeader {
  value: string;
  params: Record<string, string>;
}

function structuredHeader(value: HeaderValue | undefined): StructuredHeader | undefined {
  if (typeof value === 'object' && value !== null && 'value' in value && 'params' in value) {
    return { value: String(value.value).toLowerCase(), params: value.params };
  }
  return undefined;
}

/**
 * Offset of the body: after the blank line ending the header block
 */
function bodyOffset(entity: string): number {
  const match = /^\r?\n|\r?\n\r?\n/.exec(entity);
  return match ? match.index + match[0].length : entity.length;
}

/**
 * Split a multipart body at its boundary lines. Preamble and epilogue are dropped.
 */
export function splitMultipart(body: string, boundary: string): string[] {
  const delimiter = `--${boundary}`;
  const parts: string[] = [];
  let current: string[] | null = null;

  for (const line of body.split(/\r?\n/)) {
    const marker = line.trimEnd();
    if (marker === delimiter || marker === `${delimiter}--`) {
      if (current) {
        parts.push(current.join('\r\n'));
      }
      if (marker !== delimiter) {
        return parts;
      }
      current = [];
      continue;
    }
    current?.push(line);
  }
  return parts;
}

/**
 * Text of the first non-attachment text/plain part, walking nested
 * multiparts depth first. Each part is decoded by mailparser.
 */
async function firstPlainText(raw: Buffer, parsed: ParsedMail): Promise<string | undefined> {
  const contentType = structuredHeader(parsed.headers.get('content-type'));
  const type = contentType?.value ?? 'text/plain';

  if (type.startsWith('multipart/')) {
    const boundary = contentType?.params.boundary;
    if (!boundary) {
      return undefined;
    }
    const entity = raw.toString('latin1');
    for (const part of splitMultipart(entity.slice(bodyOffset(entity)), boundary)) {
      const partRaw = Buffer.from(part, 'latin1');
      const text = await firstPlainText(partRaw, await simpleParser(partRaw, PARSER_OPTIONS));
      if (text !== undefined) {
        return text;
      }
    }
    return undefined;
  }

  const disposition = structuredHeader(parsed.headers.get('content-disposition'));
  if (type !== 'text/plain' || disposition?.value === 'attachment') {
    return undefined;
  }
  return parsed.text ?? '';
}

/**
 * Parse raw message bytes into the fields the bridge needs
 */
export async function parseRawMessage(raw: Buffer): Promise<ParsedMessage> {
  const parsed = await simpleParser(raw, PARSER_OPTIONS);

  const senderAddress = (parsed.from?.value[0]?.address ?? '').trim().toLowerCase();
  const received = parsed.headerLines
    .filter((header) => header.key === 'received')
    .map((header) => header.line.replace(/^received:\s*/i, '').replace(/\s*\r?\n\s*/g, ' ').trim());

  return {
    senderAddress,
    senderDomain: domainOf(senderAddress),
    subject: parsed.subject ?? '',
    body: (await firstPlainText(raw, parsed)) ?? '',
    received,
    senderIp: extractSenderIp(received),
  };
}
