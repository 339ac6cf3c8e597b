import { Transform } from 'class-transformer';
import { IsDefined, IsOptional, IsString, MaxLength } from 'class-validator';

// Expiration parts arrive as JSON numbers or strings; the model coerces either.
const toText = ({ value }: { value: unknown }): unknown =>
    typeof value === 'number' ? String(value) : value;

export class CardTokenDto {

    @IsDefined({ message: 'token is required' })
    @IsString()
    @MaxLength(64)
    token!: string;

    @IsOptional()
    @Transform(toText)
    @IsString()
    @MaxLength(8)
    month?: string;

    @IsOptional()
    @Transform(toText)
    @IsString()
    @MaxLength(8)
    year?: string;

    @IsOptional()
    @IsString()
    verificationValue?: string;

    @IsOptional()
    @IsString()
    @MaxLength(30)
    brand?: string;
}

export class CardTokenReportDto {
    valid!: boolean;
    type!: string | null;
    hasExpDate!: boolean;
    expDate!: string;
    check!: boolean;
    errors!: Record<string, string[]>;
    messages!: string[];
}
