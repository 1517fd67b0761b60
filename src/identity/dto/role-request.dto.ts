import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/** Create and update body for roles; rules are applied by the request pipeline */
export class RoleRequestDto {
    @ApiProperty({ type: String, example: 'AUDITOR', description: 'Letters, digits and underscores; stored upper-case' })
    name?: unknown;

    @ApiPropertyOptional({ type: String, example: 'Read-only access to members and users' })
    description?: unknown;

    @ApiProperty({ type: [String], example: ['member:read', 'user:read'] })
    permissions?: unknown;
}
