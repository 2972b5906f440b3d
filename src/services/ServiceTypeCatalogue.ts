import { z } from 'zod';
import { loadDataFile } from '../utils/dataFiles.js';

export const ServiceTypeDataSchema = z.object({
    valid: z.array(z.string()),
    /** Known wrong base names mapped to the hint shown instead. */
    corrections: z.record(z.string()),
});
export type ServiceTypeData = z.infer<typeof ServiceTypeDataSchema>;

export type ServiceTypeCheck =
    | { status: 'valid' }
    /** A name the platform never accepts (e.g. `redis`). */
    | { status: 'wrong'; hint: string }
    /** Not in the bundled list; the live catalogue may still accept it. */
    | { status: 'unknown'; hint: string | null };

/**
 * Bundled list of service type strings used to pre-check import YAML before it reaches the API.
 */
export class ServiceTypeCatalogue {
    private readonly valid: Set<string>;
    private readonly corrections: Map<string, string>;

    constructor(data: ServiceTypeData = loadDataFile('serviceTypes.json', ServiceTypeDataSchema)) {
        this.valid = new Set(data.valid);
        this.corrections = new Map(Object.entries(data.corrections));
    }

    public check(type: string): ServiceTypeCheck {
        if (this.valid.has(type)) {
            return { status: 'valid' };
        }

        const baseName = type.split('@')[0].toLowerCase();
        const correction = this.corrections.get(baseName);
        if (correction) {
            return { status: 'wrong', hint: correction };
        }

        // e.g. mongodb@7.0 -> mongodb@7
        if (/\.\d$/.test(type)) {
            const candidate = type.slice(0, -2);
            if (this.valid.has(candidate)) {
                return { status: 'unknown', hint: `use '${candidate}' (no minor version needed)` };
            }
        }
        return { status: 'unknown', hint: null };
    }
}
