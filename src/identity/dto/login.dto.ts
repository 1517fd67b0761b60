import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class LoginDto {
    @ApiProperty({ example: 'jane.doe' })
    @IsString()
    @IsNotEmpty()
    username!: string;

    @ApiProperty({ example: 'Str0ng!Pass' })
    @IsString()
    @IsNotEmpty()
    password!: string;
}
