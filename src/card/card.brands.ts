export interface CardBrandRegistry {
    has(brand: string): boolean;
}

export const CARD_COMPANIES: ReadonlySet<string> = new Set([
    'visa',
    'master',
    'discover',
    'american_express',
    'diners_club',
    'jcb',
    'switch',
    'solo',
    'dankort',
    'maestro',
    'forbrugsforeningen',
    'laser',
]);

// Gateway card type identifiers. Brands missing here are still accepted by the
// registry but travel without a type code.
export const CARD_TYPE: Readonly<Record<string, string>> = {
    visa: 'VI',
    master: 'MC',
    american_express: 'AX',
    discover: 'DI',
    jcb: 'DI',
    diners_club: 'DI',
};

export function hasText(value: string | null | undefined): value is string {
    return value != null && value.trim() !== '';
}

export function cardTypeCode(brand: string | null | undefined): string | undefined {
    if (!hasText(brand)) {
        return undefined;
    }
    return Object.prototype.hasOwnProperty.call(CARD_TYPE, brand) ? CARD_TYPE[brand] : undefined;
}
