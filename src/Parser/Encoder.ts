import { Match } from "effect";
import { RESP } from "../RESP.js";

const encoder = new TextEncoder();
const CRLF = encoder.encode("\r\n");

const line = (marker: string, text: string): Uint8Array => encoder.encode(`${marker}${text}\r\n`);

const formatDouble = (value: number): string => {
  if (Number.isNaN(value)) {
    return "nan";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf";
  }
  return String(value);
};

function write(value: RESP.Value, out: Array<Uint8Array>): void {
  Match.valueTags(value, {
    SimpleString: ({ value }) => {
      out.push(line("+", value));
    },
    SimpleError: ({ value }) => {
      out.push(line("-", value));
    },
    Integer: ({ value }) => {
      out.push(line(":", value.toString()));
    },
    BulkString: ({ value }) => {
      out.push(line("$", String(value.length)), value, CRLF);
    },
    Array: ({ value }) => {
      out.push(line("*", String(value.length)));
      value.forEach((item) => write(item, out));
    },
    Null: () => {
      out.push(line("_", ""));
    },
    Boolean: ({ value }) => {
      out.push(line("#", value ? "t" : "f"));
    },
    Double: ({ value }) => {
      out.push(line(",", formatDouble(value)));
    },
    Map: (map) => {
      out.push(line("%", String(map.entries.length)));
      for (const [key, value] of map.entries) {
        write(RESP.bulk(key), out);
        write(value, out);
      }
    },
    Set: ({ value }) => {
      out.push(line("~", String(value.length)));
      RESP.sort(value).forEach((item) => write(item, out));
    },
  });
}

/**
 * Renders a frame to its wire bytes. Map keys and set members are written in
 * canonical order.
 */
export const encode = (value: RESP.Value): Uint8Array => {
  const parts: Array<Uint8Array> = [];
  write(value, parts);
  const bytes = new Uint8Array(parts.reduce((total, part) => total + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    bytes.set(part, offset);
    offset += part.length;
  }
  return bytes;
};
