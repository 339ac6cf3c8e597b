export class BaseResponseDto<T> {
    msg!: string;
    data!: T;
}

export class SimpleResponseDto<T> extends BaseResponseDto<T> {}
