export interface ValidationFinding {
    field: string;
    code?: string;
    message: string;
}

/**
 * Field-scoped collector that validation rules write their findings into.
 * Callers inspect it afterwards to decide whether to accept the subject.
 */
export class ValidationErrors {
    private readonly findings: ValidationFinding[] = [];

    add(field: string, message: string, code?: string): void {
        this.findings.push({ field, code, message });
    }

    on(field: string): string[] {
        return this.findings
            .filter((finding) => finding.field === field)
            .map((finding) => finding.message);
    }

    fields(): string[] {
        return [...new Set(this.findings.map((finding) => finding.field))];
    }

    get count(): number {
        return this.findings.length;
    }

    isEmpty(): boolean {
        return this.findings.length === 0;
    }

    clear(): void {
        this.findings.length = 0;
    }

    // "base" findings are about the whole subject and read as-is
    fullMessages(): string[] {
        return this.findings.map(({ field, message }) =>
            field === 'base' ? message : `${humanize(field)} ${message}`,
        );
    }

    toArray(): ValidationFinding[] {
        return this.findings.map((finding) => ({ ...finding }));
    }

    toJSON(): Record<string, string[]> {
        const grouped: Record<string, string[]> = {};
        for (const { field, message } of this.findings) {
            (grouped[field] ??= []).push(message);
        }
        return grouped;
    }
}

export function humanize(field: string): string {
    const words = field
        .replace(/([a-z\d])([A-Z])/g, '$1 $2')
        .replace(/_/g, ' ')
        .trim()
        .toLowerCase();

    return words.charAt(0).toUpperCase() + words.slice(1);
}
