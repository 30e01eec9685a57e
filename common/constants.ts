// ANSI escape sequences for console output
export const COLORS = {
    color_reset: '\u001b[0m',
    color_bold: '\u001b[1m',
    color_dim: '\u001b[2m',
    color_red: '\u001b[31m',
    color_green: '\u001b[32m',
    color_yellow: '\u001b[33m',
} as const;
