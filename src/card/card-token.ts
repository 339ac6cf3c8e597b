import { ValidationErrors } from '../validation/validation.errors';
import { Validateable, isValid } from '../validation/validateable';
import { CARD_COMPANIES, CardBrandRegistry, cardTypeCode, hasText } from './card.brands';

export type IntegerLike = number | string | null | undefined;

export interface CardTokenAttributes {
    token?: string;
    month?: IntegerLike;
    year?: IntegerLike;
    verificationValue?: string;
    brand?: string;
}

export enum CardTokenErrorCode {
    InvalidToken = 'invalid_token',
    InvalidExpirationMonth = 'invalid_expiration_month',
    InvalidExpirationYear = 'invalid_expiration_year',
    InvalidBrand = 'invalid_brand',
}

const MIN_TOKEN_LENGTH = 12;
const MIN_EXPIRY_YEAR = 1987;

/**
 * A tokenized credit card: the gateway issues a numeric token in place of the
 * card number, optionally paired with the card's expiration date and brand.
 *
 * ```ts
 * const token = new CardToken({ token: '1234567890123456', month: '9', year: '2010', brand: 'visa' });
 * token.isValid(); // true
 * token.expDate(); // '0910'
 * ```
 *
 * Values are stored as given. Nothing is checked until {@link validate} runs.
 */
export class CardToken implements Validateable {
    token?: string;
    month?: IntegerLike;
    year?: IntegerLike;
    verificationValue?: string;
    brand?: string;

    constructor(
        attributes: CardTokenAttributes = {},
        private readonly brands: CardBrandRegistry = CARD_COMPANIES,
    ) {
        this.token = attributes.token;
        this.month = attributes.month;
        this.year = attributes.year;
        this.verificationValue = attributes.verificationValue;
        this.brand = attributes.brand;
    }

    /** Gateway card type identifier, e.g. `VI` for visa. */
    get type(): string | undefined {
        return cardTypeCode(this.brand);
    }

    hasExpDate(): boolean {
        return toInteger(this.month) !== 0 && toInteger(this.year) !== 0;
    }

    /** Expiration date in MMYY format, or an empty string when it is not set. */
    expDate(): string {
        if (!this.hasExpDate()) {
            return '';
        }
        const month = String(toInteger(this.month)).padStart(2, '0');
        const year = String(toInteger(this.year)).slice(2, 4);
        return month + year;
    }

    isCheck(): boolean {
        return false;
    }

    normalize(): void {
        this.month = toInteger(this.month);
        this.year = toInteger(this.year);
    }

    validate(errors: ValidationErrors): void {
        this.normalize();
        this.validateCardToken(errors);
        this.validateExpirationDate(errors);
        this.validateCardBrand(errors);
    }

    isValid(errors: ValidationErrors = new ValidationErrors()): boolean {
        return isValid(this, errors);
    }

    // Tokens keep the length of the card number they replace and are always
    // numeric; the last four digits match the card's.
    private validateCardToken(errors: ValidationErrors): void {
        const token = this.token ?? '';
        if (token.length < MIN_TOKEN_LENGTH || !/^\d+$/.test(token)) {
            errors.add('token', 'is not a valid card token', CardTokenErrorCode.InvalidToken);
        }
    }

    private validateExpirationDate(errors: ValidationErrors): void {
        const month = toInteger(this.month);
        const year = toInteger(this.year);

        if (month === 0 && year === 0) {
            return;
        }
        if (!isValidMonth(month)) {
            errors.add('month', 'is not a valid month', CardTokenErrorCode.InvalidExpirationMonth);
        }
        if (!isValidExpiryYear(year)) {
            errors.add('year', 'is not a valid year', CardTokenErrorCode.InvalidExpirationYear);
        }
    }

    private validateCardBrand(errors: ValidationErrors): void {
        if (!hasText(this.brand) || this.brands.has(this.brand)) {
            return;
        }
        errors.add('brand', 'is invalid', CardTokenErrorCode.InvalidBrand);
    }
}

export function toInteger(value: IntegerLike): number {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? Math.trunc(value) : 0;
    }
    if (typeof value === 'string') {
        const parsed = parseInt(value, 10);
        return Number.isNaN(parsed) ? 0 : parsed;
    }
    return 0;
}

function isValidMonth(month: number): boolean {
    return month >= 1 && month <= 12;
}

function isValidExpiryYear(year: number): boolean {
    return /^\d{4}$/.test(String(year)) && year > MIN_EXPIRY_YEAR;
}
