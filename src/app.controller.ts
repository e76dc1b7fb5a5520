import { Controller, Get } from '@nestjs/common';
import { AppService } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  getRoot() {
    return this.appService.getStatus();
  }

  @Get('stats')
  async getStats() {
    return this.appService.getStats();
  }
}
