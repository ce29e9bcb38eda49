import type { Message } from "@printline/protocol";
import type { ReceiptConfig } from "../config.js";

export function center(text: string, width: number): string {
  if (text.length >= width) return text;
  const pad = Math.floor((width - text.length) / 2);
  return " ".repeat(pad) + text;
}

/** Greedy word wrap; words longer than a line are split */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split(/\r?\n/)) {
    let line = "";
    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      let rest = word;
      while (rest.length > width) {
        if (line) {
          lines.push(line);
          line = "";
        }
        lines.push(rest.slice(0, width));
        rest = rest.slice(width);
      }
      if (!rest) continue;

      if (!line) {
        line = rest;
      } else if (line.length + 1 + rest.length <= width) {
        line += ` ${rest}`;
      } else {
        lines.push(line);
        line = rest;
      }
    }
    lines.push(line);
  }

  return lines;
}

export function formatDateTime(
  timestamp: number,
  timeZone: string
): { date: string; time: string } {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hour12: true,
    timeZoneName: "short",
  }).formatToParts(new Date(timestamp));

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "";

  return {
    date: `${part("month")}/${part("day")}/${part("year")}`,
    time: `${part("hour")}:${part("minute")} ${part("dayPeriod")} ${part("timeZoneName")}`,
  };
}

/** Lay a message out as plain receipt text, one line per printer row */
export function formatReceipt(message: Message, options: ReceiptConfig): string {
  const width = options.widthChars;
  const rule = "-".repeat(width);
  const { date, time } = formatDateTime(message.createdAt, options.timeZone);

  const lines = [center(options.header, width), "=".repeat(width), ""];
  if (options.recipient) {
    lines.push(`TO: ${options.recipient}`);
  }
  lines.push(
    `MSG: #${String(message.number).padStart(3, "0")}`,
    `DATE: ${date}`,
    `TIME: ${time}`,
    `FROM: ${message.name}`,
    "",
    rule,
    ...wrapText(message.content, width),
    rule
  );
  if (options.footer) {
    lines.push(center(options.footer, width), rule);
  }

  return `${lines.join("\n")}\n`;
}
