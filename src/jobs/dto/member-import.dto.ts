/**
 * @fileoverview Member Import DTO
 *
 * Rows are checked for shape only; each row is validated when it is
 * registered, and a bad row fails on its own without failing the job.
 */

import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { ArrayMaxSize, ArrayNotEmpty, IsArray, IsOptional, ValidateNested } from 'class-validator';
import { MAX_BULK_ITEMS } from './limits';

export class MemberImportRowDto {
    @ApiProperty({ type: String, example: 'Jane Doe' })
    @IsOptional()
    name?: unknown;

    @ApiProperty({ type: String, example: 'jane@example.com' })
    @IsOptional()
    email?: unknown;

    @ApiProperty({ type: String, example: '9876543210' })
    @IsOptional()
    phoneNumber?: unknown;
}

export class MemberImportDto {
    @ApiProperty({ type: [MemberImportRowDto] })
    @IsArray()
    @ArrayNotEmpty({ message: 'rows is required and must not be empty' })
    @ArrayMaxSize(MAX_BULK_ITEMS)
    @ValidateNested({ each: true })
    @Type(() => MemberImportRowDto)
    rows!: MemberImportRowDto[];
}
