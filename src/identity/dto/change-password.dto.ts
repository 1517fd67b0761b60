import { ApiProperty } from '@nestjs/swagger';

/** Password change body; rules are applied by the request pipeline */
export class ChangePasswordDto {
    @ApiProperty({ type: String, example: 'Str0ng!Pass' })
    currentPassword?: unknown;

    @ApiProperty({ type: String, example: 'N3w!Passw0rd', description: 'Same policy as registration; must differ from the current password' })
    newPassword?: unknown;
}

export class PasswordChangedDto {
    @ApiProperty({ example: 'Password changed successfully. Please log in again with your new password.' })
    message!: string;

    @ApiProperty({ example: true })
    logoutRequired!: true;
}
