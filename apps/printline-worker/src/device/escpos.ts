const ESC = 0x1b;
const GS = 0x1d;

/** ESC @ resets the printer to its power-on mode */
export const INITIALIZE = Buffer.from([ESC, 0x40]);
/** GS V A n feeds n lines and does a partial cut */
export const FEED_AND_CUT = Buffer.from([GS, 0x56, 0x41, 0x03]);

/**
 * Receipt printers default to a single-byte code page, so fold accents away
 * and replace whatever is left outside printable ASCII.
 */
export function toPrinterText(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^\x20-\x7e\n]/g, "?");
}

export function encodeReceipt(text: string): Buffer {
  const body = Buffer.from(toPrinterText(text), "ascii");
  return Buffer.concat([INITIALIZE, body, FEED_AND_CUT]);
}
