import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Res,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Response } from 'express';
import { EstimateCarbonUseCase } from '../application/use-cases/estimate-carbon';
import { EstimateRequestDto } from '../dto/estimate-request.dto';
import { buildMissingUploadResponse, type EstimateResponseDto } from '../dto/estimate-response.dto';

@Controller('estimate')
export class EstimateController {
  constructor(private readonly estimateCarbon: EstimateCarbonUseCase) {}

  @Post()
  @HttpCode(200)
  estimate(@Body() payload: EstimateRequestDto): Promise<EstimateResponseDto> {
    return this.estimateCarbon.estimateFromDishName(payload.dish);
  }

  @Post('image')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor('file'))
  async estimateImage(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Res({ passthrough: true }) response: Response,
  ): Promise<EstimateResponseDto> {
    if (!file || file.size === 0) {
      response.status(HttpStatus.BAD_REQUEST);
      return buildMissingUploadResponse();
    }

    return this.estimateCarbon.estimateFromImage(file.buffer, file.mimetype);
  }
}
