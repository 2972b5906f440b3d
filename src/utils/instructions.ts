import { z } from 'zod';
import type { Implementation } from '@modelcontextprotocol/sdk/types.js';
import { loadDataFile } from './dataFiles.js';
import { logger } from './logger.js';

export const MODEL_FAMILIES = ['claude', 'chatgpt', 'gemini', 'cursor', 'copilot', 'generic'] as const;
export type ModelFamily = typeof MODEL_FAMILIES[number];

export const InstructionTextSchema = z.object({
    base: z.string(),
    models: z.object({
        claude: z.string(),
        chatgpt: z.string(),
        gemini: z.string(),
        cursor: z.string(),
        copilot: z.string(),
        generic: z.string(),
    }),
    common: z.string(),
});
export type InstructionText = z.infer<typeof InstructionTextSchema>;

// Checked in order; the first family with a matching substring wins.
const FAMILY_MARKERS: Array<[Exclude<ModelFamily, 'generic'>, string[]]> = [
    ['claude', ['claude']],
    ['chatgpt', ['chatgpt', 'openai']],
    ['gemini', ['gemini', 'google']],
    ['cursor', ['cursor']],
    ['copilot', ['copilot']],
];

export function detectModelFamily(clientName: string | null | undefined): ModelFamily {
    const name = (clientName ?? '').toLowerCase();
    if (!name) {
        return 'generic';
    }
    for (const [family, markers] of FAMILY_MARKERS) {
        if (markers.some(marker => name.includes(marker))) {
            return family;
        }
    }
    return 'generic';
}

/**
 * Returns a function producing the initialize `instructions` text for a given caller.
 * The caller identity only picks a section of text; it never changes what tools do.
 */
export function createInstructionProvider(
    text: InstructionText = loadDataFile('instructions.json', InstructionTextSchema),
): (clientInfo: Implementation | null) => string {
    return clientInfo => {
        const family = detectModelFamily(clientInfo?.name);
        if (clientInfo) {
            logger.info(`Instructions customised for ${family} (client ${clientInfo.name} ${clientInfo.version})`);
        } else {
            logger.info('No client name provided. Using generic instructions.');
        }
        return [text.base, text.models[family], text.common].join('\n');
    };
}
