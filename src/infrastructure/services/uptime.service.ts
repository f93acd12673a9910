export interface UptimeStatus {
  startedAt: string;
  uptime: string;
  uptimeSeconds: number;
}

export class UptimeService {
  constructor(
    private readonly now: () => number = Date.now,
    private readonly startTime: number = now(),
  ) {}

  public getUptime(): string {
    const seconds = this.getUptimeSeconds();
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);
    const days = Math.floor(hours / 24);

    if (days > 0) return `${days}d ${hours % 24}h ${minutes % 60}m`;
    if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
    if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
    return `${seconds}s`;
  }

  public getUptimeSeconds(): number {
    return Math.floor((this.now() - this.startTime) / 1000);
  }

  public getStatus(): UptimeStatus {
    return {
      startedAt: new Date(this.startTime).toISOString(),
      uptime: this.getUptime(),
      uptimeSeconds: this.getUptimeSeconds(),
    };
  }
}
