import { Controller, Get, Post, Body, HttpCode, HttpStatus, UseGuards } from '@nestjs/common';
import { AuthService } from './auth.service';
import { LoginDto } from './dto/login.dto';
import { RegisterDto } from './dto/register.dto';
import { Throttle, ThrottlerGuard } from '@nestjs/throttler';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { AdminGuard } from './guards/admin.guard';
import { LOGIN_THROTTLE } from './auth.throttle';
import { Public } from '../common/decorators/public.decorator';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { AuthUser } from './interfaces/auth-user.interface';

@Controller('auth')
@UseGuards(JwtAuthGuard)
export class AuthController {
  constructor(private authService: AuthService) {}

  @Public()
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  register(@Body() registerDto: RegisterDto) {
    return this.authService.register(registerDto);
  }

  @Public()
  @UseGuards(ThrottlerGuard)
  @Throttle(LOGIN_THROTTLE)
  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(@Body() loginDto: LoginDto) {
    return this.authService.login(loginDto.email, loginDto.password);
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  refresh(@CurrentUser() user: AuthUser) {
    return this.authService.refresh(user.userId);
  }

  @Get('me')
  me(@CurrentUser() user: AuthUser) {
    return this.authService.profile(user.userId);
  }

  @Get('admin/me')
  @UseGuards(AdminGuard)
  adminMe(@CurrentUser() user: AuthUser) {
    return this.authService.profile(user.userId);
  }

  @Get('validate-token')
  async validateToken(@CurrentUser() user: AuthUser) {
    return {
      valid: true,
      user: await this.authService.profile(user.userId),
    };
  }

  // Tokens are stateless; the client drops its copy
  @Public()
  @Post('logout')
  @HttpCode(HttpStatus.OK)
  logout() {
    return {
      message: 'Successfully logged out. Please remove the token from your client.',
      logoutTime: new Date(),
    };
  }
}
