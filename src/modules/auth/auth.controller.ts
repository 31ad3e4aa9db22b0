import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { AuthService } from './auth.service';
import { LoginRequestDto } from './dto/Login.request.dto';
import type { PublicUser } from '../../lib/catalog/public-id';

@Controller('api/auth')
export class AuthController {
  constructor(private readonly auth: AuthService) {}

  @Post('login')
  @HttpCode(200)
  async login(@Body() body: LoginRequestDto): Promise<PublicUser> {
    return this.auth.login(body.email, body.name);
  }
}
