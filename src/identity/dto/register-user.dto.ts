import { ApiProperty } from '@nestjs/swagger';

/** Self-service registration body; rules are applied by the request pipeline */
export class RegisterUserDto {
    @ApiProperty({ type: String, example: 'jane.doe', description: '3-50 characters, unique' })
    username?: unknown;

    @ApiProperty({ type: String, example: 'jane@example.com' })
    email?: unknown;

    @ApiProperty({ type: String, example: 'Str0ng!Pass', description: 'At least 8 characters with upper, lower, digit and symbol' })
    password?: unknown;
}
