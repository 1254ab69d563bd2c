import { Controller, Get, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

@Controller()
export class AppController {
  private readonly logger = new Logger(AppController.name);

  constructor(private readonly dataSource: DataSource) {}

  @Get('health')
  async health(): Promise<{ ok: boolean; database: 'up' | 'down' }> {
    if (!this.dataSource.isInitialized) {
      return { ok: false, database: 'down' };
    }

    try {
      await this.dataSource.query('SELECT 1');
      return { ok: true, database: 'up' };
    } catch (error) {
      this.logger.warn(
        `Database health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { ok: false, database: 'down' };
    }
  }
}
