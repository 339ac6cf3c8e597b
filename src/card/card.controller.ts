import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { SimpleResponseDto } from '../request/request.dto';
import { CardService } from './card.service';
import { CardTokenDto, CardTokenReportDto } from './dto/card-token.dto';

@Controller('card-token')
export class CardController {
    constructor(private readonly cardService: CardService) { }

    @HttpCode(HttpStatus.OK)
    @Post('validate')
    validateCardToken(@Body() cardToken: CardTokenDto): SimpleResponseDto<CardTokenReportDto> {
        return {
            msg: 'Card token validated',
            data: this.cardService.inspect(cardToken),
        };
    }

    @HttpCode(HttpStatus.CREATED)
    @Post()
    acceptCardToken(@Body() cardToken: CardTokenDto): SimpleResponseDto<CardTokenReportDto> {
        return {
            msg: 'Card token accepted',
            data: this.cardService.assertValid(cardToken),
        };
    }
}
