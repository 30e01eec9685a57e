import { Environment } from '../parameters/environments';
import { COLORS } from '../constants';
import * as readlineSync from 'readline-sync';

const BOX_WIDTH = 60;

/**
 * Calculate the actual display width of a string excluding ANSI escape sequences
 */
function getVisibleLength(str: string): number {
    // eslint-disable-next-line no-control-regex
    const stripped = str.replace(/\u001b\[\d+m/g, '');

    const segmenter = new Intl.Segmenter('en', { granularity: 'grapheme' });
    let length = 0;
    for (const { segment } of segmenter.segment(stripped)) {
        const code = segment.codePointAt(0) ?? 0;
        if (
            (code >= 0x1F300 && code <= 0x1F9FF) || // Emojis
            (code >= 0x2600 && code <= 0x27BF) ||   // Miscellaneous Symbols
            segment.length > 1                       // Surrogate pairs
        ) {
            length += 2;
        } else {
            length += 1;
        }
    }
    return length;
}

/**
 * Pad a line to the box width, truncating content that does not fit
 */
export function padBoxLine(content: string, width = BOX_WIDTH): string {
    const padding = width - getVisibleLength(content);
    if (padding < 0) {
        return content.substring(0, width);
    }
    return content + ' '.repeat(padding);
}

function renderBox(color: string, title: string, lines: string[]): string {
    const edge = (text: string) => `${color}│${padBoxLine(text)}${color}│${COLORS.color_reset}`;
    return [
        '',
        `${color}╭${'─'.repeat(BOX_WIDTH)}╮${COLORS.color_reset}`,
        edge(`${COLORS.color_bold} ${title}${COLORS.color_reset}`),
        edge(''),
        ...lines.map((line) => edge(`  ${line}`)),
        edge(''),
        `${color}╰${'─'.repeat(BOX_WIDTH)}╯${COLORS.color_reset}`,
        '',
    ].join('\n');
}

/**
 * Validate and confirm deployment
 * - Display project name, environment name and the database instances to be deployed
 * - Verify that account ID matches
 * - Request user confirmation for production environment
 *
 * @param summary - One line per database instance, shown before confirmation
 * @throws {Error} If account ID does not match or user aborts deployment
 */
export function validateDeployment(
    pjName: string,
    envName: Environment,
    accountId?: string,
    summary: string[] = [],
): void {
    console.log(`Project Name: ${pjName}`);
    console.log(`Environment Name: ${envName}`);
    summary.forEach((line) => console.log(`  ${line}`));

    if (accountId) {
        const currentAccount = process.env.CDK_DEFAULT_ACCOUNT;
        if (accountId !== currentAccount) {
            console.log(renderBox(COLORS.color_yellow, '❌ ACCOUNT MISMATCH WARNING', [
                'The provided account ID does not match the current',
                'CDK account.',
                '',
                `${COLORS.color_dim}Expected: ${accountId}${COLORS.color_reset}`,
                `${COLORS.color_dim}Current:  ${currentAccount}${COLORS.color_reset}`,
            ]));
            throw new Error('Account ID mismatch. Deployment aborted.');
        }
    }

    if (envName === Environment.PRODUCTION) {
        console.log(renderBox(COLORS.color_red, '🚨 PRODUCTION DATABASE DEPLOYMENT', [
            'This is a production release.',
            'Please review carefully before proceeding.',
            ...summary,
        ]));

        const answer = readlineSync.question('Are you sure you want to proceed? (yes/no): ');
        if (answer.toLowerCase() !== 'yes') {
            throw new Error('Deployment aborted by user.');
        }
        console.log(`${COLORS.color_green}✓${COLORS.color_reset} Proceeding with deployment...`);
    }
}
