import { IsEmail, IsOptional, IsString } from 'class-validator';

export class LoginRequestDto {
  @IsEmail()
  public readonly email!: string;

  @IsOptional()
  @IsString()
  public readonly name?: string;
}
