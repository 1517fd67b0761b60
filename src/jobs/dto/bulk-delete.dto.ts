import { ApiProperty } from '@nestjs/swagger';
import { ArrayMaxSize, ArrayNotEmpty, IsArray, IsString } from 'class-validator';
import { MAX_BULK_ITEMS } from './limits';

export class BulkDeleteDto {
    @ApiProperty({ type: [String], example: ['mem-1', 'mem-2'] })
    @IsArray()
    @ArrayNotEmpty({ message: 'memberIds is required and must not be empty' })
    @ArrayMaxSize(MAX_BULK_ITEMS)
    @IsString({ each: true })
    memberIds!: string[];
}
