const BYTES_PER_LINE = 16;

// Same layout as `hd -v`, ending with a line holding the total length.
export function hexdump(input: string | Uint8Array): string {
  const bytes = typeof input === "string" ? new TextEncoder().encode(input) : input;
  const lines: string[] = [];

  for (let offset = 0; offset < bytes.length; offset += BYTES_PER_LINE) {
    const chunk = Array.from(bytes.subarray(offset, offset + BYTES_PER_LINE));
    const hex = chunk.map((byte) => byte.toString(16).padStart(2, "0"));
    const left = hex.slice(0, 8).join(" ").padEnd(23);
    const right = hex.slice(8).join(" ").padEnd(23);
    const text = chunk.map((byte) => (byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : ".")).join("");
    lines.push(`${formatOffset(offset)}  ${left}  ${right}  |${text}|`);
  }

  lines.push(formatOffset(bytes.length));
  return `${lines.join("\n")}\n`;
}

function formatOffset(offset: number): string {
  return offset.toString(16).padStart(8, "0");
}
