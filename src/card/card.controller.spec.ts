import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, HttpException, Logger, ValidationPipe } from '@nestjs/common';
import { CardController } from './card.controller';
import { CardService } from './card.service';
import { CardTokenDto } from './dto/card-token.dto';

describe('CardController', () => {
  let controller: CardController;
  const pipe = new ValidationPipe({
    transform: true,
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  const parseBody = (body: unknown): Promise<CardTokenDto> =>
    pipe.transform(body, { type: 'body', metatype: CardTokenDto });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [CardController],
      providers: [CardService],
    }).compile();

    controller = module.get<CardController>(CardController);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('validates a token sent with numeric expiration parts', async () => {
    const body = await parseBody({ token: '123456789012', month: 9, year: 2010, brand: 'visa' });

    expect(body.month).toBe('9');
    expect(controller.validateCardToken(body)).toEqual({
      msg: 'Card token validated',
      data: {
        valid: true,
        type: 'VI',
        hasExpDate: true,
        expDate: '0910',
        check: false,
        errors: {},
        messages: [],
      },
    });
  });

  it('reports findings without failing the validate route', async () => {
    const body = await parseBody({ token: '123456789012', brand: 'unknown_brand' });

    const response = controller.validateCardToken(body);

    expect(response.data.valid).toBe(false);
    expect(response.data.errors).toEqual({ brand: ['is invalid'] });
  });

  it('accepts a valid token', async () => {
    const body = await parseBody({ token: '123456789012' });

    expect(controller.acceptCardToken(body).msg).toBe('Card token accepted');
  });

  it('refuses an invalid token', async () => {
    const body = await parseBody({ token: '123456789012', month: 13, year: 2010 });

    expect(() => controller.acceptCardToken(body)).toThrow(HttpException);
  });

  it.each([
    [{}],
    [{ token: 123456789012 }],
    [{ token: '123456789012', month: true }],
    [{ token: '123456789012', cvv: '123' }],
  ])('rejects the malformed body %p', async (body) => {
    await expect(parseBody(body)).rejects.toBeInstanceOf(BadRequestException);
  });
});
