import { DEFAULT_PIPELINE_CONFIG } from '../../../config/pipeline.config';
import { InvalidRequestError } from '../../../domain/errors';
import { FakeBaselineStore } from '../../../modules/regime-pipeline/__tests__/pipeline.fakes';
import { SetBaselineDto } from '../../dto/set-baseline.dto';
import { SetBaselineUseCase } from '../set-baseline.use-case';

function dto(first: string, second: string, value: number): SetBaselineDto {
  const request = new SetBaselineDto();
  request.first = first;
  request.second = second;
  request.value = value;
  return request;
}

async function problemsOf(run: Promise<unknown>): Promise<readonly string[]> {
  try {
    await run;
  } catch (error) {
    if (error instanceof InvalidRequestError) return error.problems;
    throw error;
  }
  throw new Error('expected an InvalidRequestError');
}

describe('SetBaselineUseCase', () => {
  let store: FakeBaselineStore;
  let useCase: SetBaselineUseCase;

  beforeEach(() => {
    store = new FakeBaselineStore();
    useCase = new SetBaselineUseCase(DEFAULT_PIPELINE_CONFIG, store);
  });

  it('stores the baseline under the sorted pair key', async () => {
    await expect(useCase.execute(dto('SOL/USDT', 'BTC/USDT', 0.64))).resolves.toEqual({
      pair: 'BTC/USDT:SOL/USDT',
      value: 0.64,
    });
    expect(store.values.get('BTC/USDT:SOL/USDT')).toBe(0.64);
  });

  it('rejects symbols outside the configured universe', async () => {
    await expect(problemsOf(useCase.execute(dto('BTC/USDT', 'DOGE/USDT', 0.5)))).resolves.toEqual([
      'DOGE/USDT is not a configured symbol',
    ]);
  });

  it('rejects a pair of one symbol', async () => {
    await expect(problemsOf(useCase.execute(dto('BTC/USDT', 'BTC/USDT', 1)))).resolves.toEqual([
      'a pair needs two different symbols',
    ]);
  });

  it('rejects a value outside [-1, 1]', async () => {
    await expect(problemsOf(useCase.execute(dto('BTC/USDT', 'ETH/USDT', 1.2)))).resolves.toEqual([
      'value must not be greater than 1',
    ]);
    expect(store.values.size).toBe(0);
  });
});
