import { IsEmail, IsNotEmpty, IsString, MaxLength, MinLength } from 'class-validator';

export class RegisterDto {
  @IsEmail()
  @MaxLength(100)
  email!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  username!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  first_name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  last_name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  phone_number!: string;

  @IsString()
  @MinLength(8)
  password!: string;
}
