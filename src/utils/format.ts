import chalk from "chalk";
import type { Label } from "../api/types.ts";

export const ID_WIDTH = 8;
export const NAME_WIDTH = 28;
export const COLOR_WIDTH = 11;

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

export function padEnd(str: string, len: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, "");
  const pad = Math.max(0, len - stripped.length);
  return str + " ".repeat(pad);
}

export function truncate(str: string, maxLen: number): string {
  return str.length > maxLen ? str.slice(0, maxLen - 1) + "..." : str;
}

/** A colored block for hex colors; color words are shown as-is. */
export function colorSwatch(color: string): string {
  return HEX_COLOR.test(color) ? chalk.hex(color)("■") + " " + color : color;
}

export function formatLabelRow(label: Label): string {
  const id = padEnd(String(label.id), ID_WIDTH);
  const name = padEnd(truncate(label.name, NAME_WIDTH - 1), NAME_WIDTH);
  const color = padEnd(colorSwatch(label.color), COLOR_WIDTH);
  const priority = label.priority !== undefined ? chalk.cyan(`p${label.priority}`) : chalk.dim("-");
  const sub = label.subscribed ? chalk.yellow("*") : " ";
  return `${id} ${name} ${color} ${padEnd(priority, 4)} ${sub}`;
}

export function labelTableHeader(): string {
  return `${padEnd("ID", ID_WIDTH)} ${padEnd("Name", NAME_WIDTH)} ${padEnd("Color", COLOR_WIDTH)} ${padEnd("Pri", 4)} Sub`;
}

export function tableSeparatorWidth(): number {
  return ID_WIDTH + 1 + NAME_WIDTH + 1 + COLOR_WIDTH + 1 + 4 + 1 + 3;
}
