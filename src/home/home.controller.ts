import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';

import { HomeService } from './home.service';
import { HealthService } from './health.service';

@ApiTags('Home')
@Controller()
export class HomeController {
  constructor(
    private service: HomeService,
    private healthService: HealthService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Get Application Information',
    description: 'Name and version of the API. Public endpoint.',
  })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: {
        name: { type: 'string', example: 'Policy Analysis API' },
        version: { type: 'string', example: '1.0.0' },
      },
    },
  })
  appInfo() {
    return this.service.appInfo();
  }

  @Get('health')
  @ApiOperation({
    summary: 'Health Check',
    description: 'Liveness of the service and number of stored policy analyses.',
  })
  @ApiOkResponse({
    description: 'Health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        policies: { type: 'number', example: 12 },
      },
    },
  })
  async health() {
    return this.healthService.check();
  }
}
