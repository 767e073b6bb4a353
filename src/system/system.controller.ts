import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { SystemService } from './system.service';

@ApiTags('System')
@Controller('system')
export class SystemController {
  constructor(private readonly systemService: SystemService) {}

  @Get('health')
  @ApiOperation({ summary: 'Liveness and database reachability' })
  getHealth() {
    return this.systemService.getHealth();
  }

  @Get('overview')
  getOverview() {
    return this.systemService.getOverview();
  }
}
