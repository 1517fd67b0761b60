/**
 * @fileoverview Member Request DTO
 *
 * Shape of register and update bodies. Field rules are applied by the
 * request pipeline, so no class-validator decorators here.
 */

import { ApiProperty } from '@nestjs/swagger';

export class MemberRequestDto {
    @ApiProperty({ type: String, example: 'Jane Doe', description: '1-25 characters, no digits' })
    name?: unknown;

    @ApiProperty({ type: String, example: 'jane@example.com', description: 'Unique across all members' })
    email?: unknown;

    @ApiProperty({ type: String, example: '9876543210', description: '10 digits starting with 6, 7, 8 or 9' })
    phoneNumber?: unknown;
}
