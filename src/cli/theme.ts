import chalk from "chalk";

/** Success: checkmarks, recognized containers */
export const success = chalk.green;

/** Danger: errors, unrecognized files */
export const danger = chalk.red;

/** Muted: secondary text */
export const dim = chalk.dim;

export function successMark(text: string): string {
  return `${success("✓")} ${text}`;
}

export function failMark(text: string): string {
  return `${danger("✗")} ${text}`;
}
