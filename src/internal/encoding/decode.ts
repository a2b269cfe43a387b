export type RawContent = string | Uint8Array;

export interface DecodeOptions {
  /** Encoding used when neither a byte-order mark nor a `<meta charset>` names one. */
  readonly defaultEncoding?: string;
  readonly sniffMeta?: boolean;
  readonly maxPrescanBytes?: number;
}

export interface DecodedContent {
  readonly text: string;
  readonly encoding: string;
  readonly source: "string" | "bom" | "meta" | "default";
}

const META_CHARSET = /<meta[^>]*?charset\s*=\s*["']?\s*([A-Za-z0-9._:-]+)/i;

function detectBom(bytes: Uint8Array): string | null {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return "utf-8";
  }

  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return "utf-16be";
  }

  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return "utf-16le";
  }

  return null;
}

function canonicalizeLabel(label: string): string | null {
  const normalized = label.trim().toLowerCase();
  if (normalized.length === 0) {
    return null;
  }

  try {
    return new TextDecoder(normalized).encoding;
  } catch {
    // TextDecoder rejects labels it does not know; those are ignored.
    return null;
  }
}

function sniffMetaCharset(bytes: Uint8Array, maxPrescanBytes: number): string | null {
  const scan = new TextDecoder("latin1").decode(bytes.subarray(0, Math.min(bytes.length, maxPrescanBytes)));
  const label = META_CHARSET.exec(scan)?.[1];
  if (label === undefined) {
    return null;
  }

  const encoding = canonicalizeLabel(label);
  // A document that was decodable as ASCII cannot really be UTF-16.
  return encoding !== null && encoding.startsWith("utf-16") ? "utf-8" : encoding;
}

export function decodeContent(content: RawContent, options: DecodeOptions = {}): DecodedContent {
  if (typeof content === "string") {
    return { text: content, encoding: "utf-8", source: "string" };
  }

  const bom = detectBom(content);
  if (bom !== null) {
    return { text: new TextDecoder(bom).decode(content), encoding: bom, source: "bom" };
  }

  if (options.sniffMeta ?? true) {
    const meta = sniffMetaCharset(content, options.maxPrescanBytes ?? 1024);
    if (meta !== null) {
      return { text: new TextDecoder(meta).decode(content), encoding: meta, source: "meta" };
    }
  }

  const encoding = canonicalizeLabel(options.defaultEncoding ?? "utf-8") ?? "utf-8";
  return { text: new TextDecoder(encoding).decode(content), encoding, source: "default" };
}

export function contentText(content: RawContent): string {
  return decodeContent(content).text;
}

export function contentBytes(content: RawContent): Uint8Array {
  return typeof content === "string" ? new TextEncoder().encode(content) : content;
}
