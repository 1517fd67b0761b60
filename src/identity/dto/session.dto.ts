/**
 * @fileoverview Session DTOs
 */

import { ApiProperty } from '@nestjs/swagger';

export class SessionViewDto {
    @ApiProperty()
    id!: string;

    @ApiProperty({ example: 'Chrome on Windows' })
    deviceInfo!: string;

    @ApiProperty({ type: String, nullable: true, example: '203.0.113.7' })
    ipAddress!: string | null;

    @ApiProperty()
    issuedAt!: string;

    @ApiProperty()
    lastUsedAt!: string;

    @ApiProperty()
    expiresAt!: string;

    @ApiProperty({ description: 'Whether this session issued the token on the request' })
    current!: boolean;
}

export class LogoutAllResponseDto {
    @ApiProperty({ example: 2 })
    revokedSessions!: number;
}
