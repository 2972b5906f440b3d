import { z } from 'zod';
import { TtlCache } from './TtlCache.js';
import { withTimeout } from '../utils/abort.js';
import { errorMessage } from '../utils/errors.js';
import { loadDataFile } from '../utils/dataFiles.js';
import { logger } from '../utils/logger.js';

export const GUIDE_TYPES = ['fresh_project', 'existing_service', 'add_services'] as const;
export type GuideType = typeof GUIDE_TYPES[number];

const FallbackGuideSchema = z.object({
    title: z.string(),
    workflow: z.array(z.string()),
});

export const FallbackGuidesSchema = z.object({
    fresh_project: FallbackGuideSchema,
    existing_service: FallbackGuideSchema,
    add_services: FallbackGuideSchema,
});
export type FallbackGuides = z.infer<typeof FallbackGuidesSchema>;

export type GuideDocument = {
    source: 'remote' | 'fallback';
    path_type: GuideType;
    url: string;
    title: string | null;
    content: string;
    workflow: string[];
    fetched_at: string;
    error: string | null;
};

export interface GuideServiceOptions {
    baseUrl: string;
    timeoutMs: number;
    cache: TtlCache<GuideDocument>;
    fallbacks?: FallbackGuides;
}

/**
 * Loads workflow guides (markdown) from the remote knowledge repository.
 * Results, including fallbacks, are cached for the cache's freshness window.
 */
export class GuideService {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly cache: TtlCache<GuideDocument>;
    private readonly fallbacks: FallbackGuides;

    constructor(options: GuideServiceOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
        this.cache = options.cache;
        this.fallbacks = options.fallbacks ?? loadDataFile('platformGuides.json', FallbackGuidesSchema);
    }

    public load(pathType: GuideType): Promise<GuideDocument> {
        return this.cache.getOrLoad(pathType, () => this.fetchGuide(pathType));
    }

    private async fetchGuide(pathType: GuideType): Promise<GuideDocument> {
        const url = `${this.baseUrl}/${pathType}.md`;
        const fetchedAt = new Date().toISOString();
        const guard = withTimeout(undefined, this.timeoutMs);
        try {
            const response = await fetch(url, { signal: guard.signal });
            if (!response.ok) {
                throw new Error(`HTTP ${response.status} ${response.statusText}`);
            }
            const content = await response.text();
            logger.info(`Loaded platform guide ${pathType} from ${url}`);
            return {
                source: 'remote',
                path_type: pathType,
                url,
                title: null,
                content,
                workflow: [],
                fetched_at: fetchedAt,
                error: null,
            };
        } catch (error: unknown) {
            logger.warn(`Failed to fetch platform guide ${pathType}: ${errorMessage(error)}. Using bundled fallback.`);
            const fallback = this.fallbacks[pathType];
            return {
                source: 'fallback',
                path_type: pathType,
                url,
                title: fallback.title,
                content: [fallback.title, '', ...fallback.workflow].join('\n'),
                workflow: fallback.workflow,
                fetched_at: fetchedAt,
                error: `Failed to fetch guide: ${errorMessage(error)}`,
            };
        } finally {
            guard.dispose();
        }
    }
}
