/**
 * @fileoverview Member List Query DTO
 */

import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { PageQueryDto } from '../../shared/pagination';

/** `field` or `field,direction`, e.g. `email,desc` */
export const MEMBER_SORT_PATTERN = /^(name|email|phoneNumber|createdAt|updatedAt)(,(asc|desc))?$/;

export class MemberListQueryDto extends PageQueryDto {
    @ApiPropertyOptional({ example: 'name,asc' })
    @IsOptional()
    @IsString()
    @Matches(MEMBER_SORT_PATTERN, { message: 'sort must be <field>[,asc|desc] on name, email, phoneNumber, createdAt or updatedAt' })
    sort?: string;

    @ApiPropertyOptional({ example: 'jane', description: 'Case-insensitive match on name, email or phone number' })
    @IsOptional()
    @IsString()
    @MaxLength(100)
    search?: string;
}
