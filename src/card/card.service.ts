import { Injectable, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { ValidationErrors } from '../validation/validation.errors';
import { CardToken } from './card-token';
import { maskToken } from './utils/mask.utils';
import { CardTokenDto, CardTokenReportDto } from './dto/card-token.dto';

@Injectable()
export class CardService {
    private readonly logger = new Logger(CardService.name);

    build(dto: CardTokenDto): CardToken {
        return new CardToken({
            token: dto.token,
            month: dto.month,
            year: dto.year,
            verificationValue: dto.verificationValue,
            brand: dto.brand,
        });
    }

    inspect(dto: CardTokenDto): CardTokenReportDto {
        const cardToken = this.build(dto);
        const errors = new ValidationErrors();
        const valid = cardToken.isValid(errors);

        if (valid) {
            this.logger.log(`[inspect] Card token ${maskToken(dto.token)} is valid`);
        } else {
            this.logger.warn(`[inspect] Card token ${maskToken(dto.token)} rejected: ${errors.fullMessages().join(', ')}`);
        }

        return {
            valid,
            type: cardToken.type ?? null,
            hasExpDate: cardToken.hasExpDate(),
            expDate: cardToken.expDate(),
            check: cardToken.isCheck(),
            errors: errors.toJSON(),
            messages: errors.fullMessages(),
        };
    }

    assertValid(dto: CardTokenDto): CardTokenReportDto {
        const report = this.inspect(dto);

        if (!report.valid) {
            throw new HttpException(
                { message: report.messages, errors: report.errors },
                HttpStatus.UNPROCESSABLE_ENTITY,
            );
        }

        return report;
    }
}
