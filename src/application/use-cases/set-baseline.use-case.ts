import { validateSync } from 'class-validator';
import { PipelineConfig } from '../../config/pipeline.config';
import { InvalidRequestError } from '../../domain/errors';
import { ICorrelationBaselineStore } from '../../domain/interfaces/services.interface';
import { pairKey } from '../../modules/regime-pipeline';
import { Inject, Injectable } from '../../shared/decorators';
import { SetBaselineDto } from '../dto/set-baseline.dto';

@Injectable()
export class SetBaselineUseCase {
  constructor(
    @Inject('PipelineConfig') private readonly config: PipelineConfig,
    @Inject('ICorrelationBaselineStore')
    private readonly baselines: ICorrelationBaselineStore,
  ) {}

  public async execute(dto: SetBaselineDto): Promise<{ pair: string; value: number }> {
    const problems = validateSync(dto).flatMap((e) => Object.values(e.constraints ?? {}));
    if (problems.length === 0) {
      for (const symbol of [dto.first, dto.second]) {
        if (!this.config.symbols.includes(symbol)) problems.push(`${symbol} is not a configured symbol`);
      }
      if (dto.first === dto.second) problems.push('a pair needs two different symbols');
    }
    if (problems.length > 0) throw new InvalidRequestError(problems);

    const pair = pairKey(dto.first, dto.second);
    await this.baselines.setBaseline(pair, dto.value);
    return { pair, value: dto.value };
  }
}
