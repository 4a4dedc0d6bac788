import { BadRequestException, Body, Controller, Delete, Get, Param, Post, Query } from '@nestjs/common';
import { IsArray, IsBoolean, IsEnum, IsInt, IsObject, IsOptional, IsString, IsUrl, Max, Min } from 'class-validator';
import { WebhookService } from './webhook.service';
import { WebhookEventType } from './webhook.types';

export class CreateWebhookEndpointDto {
  @IsUrl({ require_tld: false })
  url!: string;

  @IsOptional()
  @IsString()
  secret?: string;

  @IsOptional()
  @IsArray()
  @IsEnum(WebhookEventType, { each: true })
  events?: WebhookEventType[];

  @IsOptional()
  @IsBoolean()
  enabled?: boolean;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  maxAttempts?: number;

  @IsOptional()
  @IsObject()
  headers?: Record<string, string>;
}

@Controller('webhooks')
export class WebhookController {
  constructor(private readonly webhookService: WebhookService) {}

  // Le secret n'est jamais renvoyé
  @Get('endpoints')
  listEndpoints() {
    const endpoints = this.webhookService
      .listEndpoints()
      .map(({ secret, ...endpoint }) => ({ ...endpoint, signed: Boolean(secret) }));
    return { count: endpoints.length, endpoints };
  }

  @Post('endpoints')
  addEndpoint(@Body() body: CreateWebhookEndpointDto) {
    const id = this.webhookService.addEndpoint({
      url: body.url,
      secret: body.secret,
      events: body.events?.length ? body.events : '*',
      enabled: body.enabled ?? true,
      maxAttempts: body.maxAttempts,
      headers: body.headers,
    });
    return { success: true, id };
  }

  @Delete('endpoints/:id')
  removeEndpoint(@Param('id') id: string) {
    if (!this.webhookService.removeEndpoint(id)) {
      throw new BadRequestException(`Endpoint ${id} introuvable`);
    }
    return { success: true };
  }

  @Get('history')
  getHistory(@Query('limit') limit?: string) {
    const parsed = Number.parseInt(limit ?? '', 10);
    const history = this.webhookService.getEventHistory(parsed > 0 ? parsed : undefined);
    return { count: history.length, history };
  }

  /**
   * Événement de test vers tous les endpoints abonnés
   */
  @Post('test')
  async sendTest() {
    const deliveries = await this.webhookService.emit(WebhookEventType.TEST, {
      message: 'Événement de test',
      sentAt: new Date().toISOString(),
    });
    return { success: deliveries.every((d) => d.success), deliveries };
  }
}
