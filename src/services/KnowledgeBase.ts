import { z } from 'zod';
import { loadDataFile } from '../utils/dataFiles.js';

const RuntimeKnowledgeSchema = z.object({
    runtime: z.string(),
    examples: z.record(z.string()),
    deployment_yaml: z.string().optional(),
    note: z.string().optional(),
    tips: z.array(z.string()),
});

export const KnowledgeBaseDataSchema = z.object({
    fallbackRuntime: z.string(),
    aliases: z.record(z.string()),
    runtimes: z.record(RuntimeKnowledgeSchema),
}).refine(data => data.fallbackRuntime in data.runtimes, {
    message: 'fallbackRuntime must name an entry of runtimes',
    path: ['fallbackRuntime'],
});
export type KnowledgeBaseData = z.infer<typeof KnowledgeBaseDataSchema>;

export type RuntimeKnowledge = {
    runtime: string;
    examples: { [name: string]: string };
    deployment_yaml: string | null;
    note: string | null;
    tips: string[];
};

export type KnowledgeLookup =
    | { found: true; knowledge: RuntimeKnowledge }
    | { found: false; runtime: string; message: string; pattern: RuntimeKnowledge };

/**
 * Bundled YAML examples per runtime.
 */
export class KnowledgeBase {
    private readonly aliases: Map<string, string>;
    private readonly entries: Map<string, RuntimeKnowledge>;
    private readonly fallback: RuntimeKnowledge;

    constructor(data: KnowledgeBaseData = loadDataFile('knowledgeBase.json', KnowledgeBaseDataSchema)) {
        this.aliases = new Map(Object.entries(data.aliases));
        this.entries = new Map(Object.entries(data.runtimes).map(([key, entry]): [string, RuntimeKnowledge] => [key, normalize(entry)]));
        this.fallback = normalize(data.runtimes[data.fallbackRuntime]);
    }

    public lookup(runtime: string): KnowledgeLookup {
        const requested = runtime.trim().toLowerCase();
        const entry = this.entries.get(this.aliases.get(requested) ?? requested);
        if (entry) {
            return { found: true, knowledge: entry };
        }
        return {
            found: false,
            runtime: requested,
            message: `Runtime '${requested}' not directly supported. Use Node.js pattern as reference.`,
            pattern: this.fallback,
        };
    }
}

function normalize(entry: z.infer<typeof RuntimeKnowledgeSchema>): RuntimeKnowledge {
    return {
        runtime: entry.runtime,
        examples: entry.examples,
        deployment_yaml: entry.deployment_yaml ?? null,
        note: entry.note ?? null,
        tips: entry.tips,
    };
}
