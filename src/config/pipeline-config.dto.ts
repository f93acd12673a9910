import {
  ArrayMaxSize,
  ArrayMinSize,
  ArrayUnique,
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsPositive,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { TIMEFRAMES } from '../domain/types/market.types';

export class PipelineConfigDto {
  @IsArray()
  @ArrayMinSize(2, { message: 'At least two symbols are required for correlation pairs' })
  @ArrayUnique()
  @Matches(/^[A-Z0-9]+\/[A-Z0-9]+$/, { each: true, message: 'Symbol must look like BASE/QUOTE' })
  symbols!: string[];

  @IsArray()
  @ArrayMinSize(1)
  @ArrayUnique()
  @IsIn(TIMEFRAMES, { each: true })
  timeframes!: string[];

  @IsNumber()
  @IsPositive({ message: 'Cascade lookback hours must be positive' })
  cascadeLookbackHours!: number;

  @IsArray()
  @ArrayMinSize(4)
  @ArrayMaxSize(4, { message: 'Exactly four cascade severity boundaries are required' })
  @IsNumber({}, { each: true })
  cascadeSeverityBoundaries!: number[];

  @IsNumber()
  @Min(0)
  @Max(1)
  cascadeBalancedTolerance!: number;

  @IsInt()
  @Min(1)
  cascadeLevelBins!: number;

  @IsInt()
  @Min(0)
  cascadeTopLevels!: number;

  @IsNumber()
  @IsPositive()
  fundingWindowDays!: number;

  @IsNumber()
  @IsPositive()
  fundingZThreshold!: number;

  @IsInt()
  @Min(2)
  volatilityRealizedWindow!: number;

  @IsInt()
  @IsPositive()
  volatilityBaselineHours!: number;

  @IsArray()
  @ArrayMinSize(3)
  @ArrayMaxSize(3, { message: 'Exactly three volatility boundaries are required' })
  @IsNumber({}, { each: true })
  volatilityBoundaries!: number[];

  @IsArray()
  @ArrayMinSize(4)
  @ArrayMaxSize(4, { message: 'Exactly four volatility risk multipliers are required' })
  @IsNumber({}, { each: true })
  volatilityRiskMultipliers!: number[];

  @IsArray()
  @ArrayMinSize(4)
  @ArrayMaxSize(4, { message: 'Exactly four multi-timeframe baseline windows are required' })
  @IsInt({ each: true })
  mtfBaselineWindows!: number[];

  @IsInt()
  @Min(2)
  mtfMinObservations!: number;

  @IsNumber()
  @IsPositive()
  mtfIgnitionZ!: number;

  @IsNumber()
  mtfCoolingPriceZ!: number;

  @IsNumber()
  mtfCoolingMinHeat!: number;

  @IsNumber()
  @IsPositive()
  mtfChopBand!: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  mtfHighConfidence!: number;

  @IsInt()
  @IsPositive()
  correlationWindowHours!: number;

  @IsInt()
  @Min(3)
  correlationMinSamples!: number;

  @IsNumber()
  @Min(0)
  @Max(2)
  correlationBreakoutDelta!: number;

  @IsInt()
  @IsPositive()
  fetchTimeoutMs!: number;

  @IsNumber()
  @IsPositive()
  cycleIntervalMinutes!: number;

  @IsInt()
  @Min(1)
  unavailableAlertAfter!: number;
}
