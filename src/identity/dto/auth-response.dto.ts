/**
 * @fileoverview Auth Response DTOs
 */

import { ApiProperty } from '@nestjs/swagger';

export class PrincipalSummaryDto {
    @ApiProperty()
    id!: string;

    @ApiProperty()
    username!: string;

    @ApiProperty()
    email!: string;

    @ApiProperty({ type: [String], example: ['USER'] })
    roles!: string[];

    @ApiProperty({ type: [String], example: ['member:create', 'member:read'] })
    permissions!: string[];
}

export class AuthResponseDto {
    @ApiProperty()
    accessToken!: string;

    @ApiProperty({ description: 'Single-use; every refresh returns a new one' })
    refreshToken!: string;

    @ApiProperty({ example: 'Bearer' })
    tokenType!: 'Bearer';

    @ApiProperty({ example: 3600, description: 'Token lifetime in seconds' })
    expiresIn!: number;

    @ApiProperty({ type: PrincipalSummaryDto })
    user!: PrincipalSummaryDto;
}
