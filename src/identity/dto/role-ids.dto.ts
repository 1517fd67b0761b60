import { ApiProperty } from '@nestjs/swagger';

/** Body of role assignment and removal; rules are applied by the request pipeline */
export class RoleIdsDto {
    @ApiProperty({ type: [String], example: ['3f1c2b9e-6a55-4d0e-9f0a-0d7a1c2e4b11'] })
    roleIds?: unknown;
}
