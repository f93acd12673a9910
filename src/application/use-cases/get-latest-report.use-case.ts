import { ICycleReportRepository } from '../../domain/interfaces/repositories.interface';
import { CombinedReport } from '../../domain/types/results.types';
import { Inject, Injectable } from '../../shared/decorators';

@Injectable()
export class GetLatestReportUseCase {
  constructor(
    @Inject('ICycleReportRepository')
    private readonly reports: ICycleReportRepository,
  ) {}

  public async execute(): Promise<CombinedReport | null> {
    return this.reports.findLatest();
  }
}
