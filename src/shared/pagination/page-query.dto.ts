import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';

export class PageQueryDto {
    @ApiPropertyOptional({ example: 0, description: 'Zero-based page index' })
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    page?: number;

    @ApiPropertyOptional({ example: 10, description: 'Page size, capped at 100' })
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    size?: number;
}
