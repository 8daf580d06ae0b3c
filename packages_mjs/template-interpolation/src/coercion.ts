import { TemplateValue } from './types';

export function coerceToString(value: TemplateValue | undefined): string {
    if (value === null || value === undefined) return "";
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return JSON.stringify(value);
}
