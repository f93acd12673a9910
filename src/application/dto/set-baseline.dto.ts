import { IsNumber, Matches, Max, Min } from 'class-validator';

const SYMBOL_PATTERN = /^[A-Z0-9]+\/[A-Z0-9]+$/;

export class SetBaselineDto {
  @Matches(SYMBOL_PATTERN, { message: 'first symbol must look like BTC/USDT' })
  first!: string;

  @Matches(SYMBOL_PATTERN, { message: 'second symbol must look like ETH/USDT' })
  second!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'value must be a number' })
  @Min(-1)
  @Max(1)
  value!: number;
}
