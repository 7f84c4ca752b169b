import { Body, Controller, HttpCode, HttpStatus, Ip, Post } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from '../../config';
import { validateRequest } from '../../middleware/validation';
import { ROLES, Role } from '../../types';
import { UnauthorizedError, ValidationError } from '../../utils/errors';
import { generateToken } from '../../utils/jwt';
import { Logger } from '../../utils/logger';
import { unwrapResult } from '../../utils/result';

const tokenRequestSchema = z.object({
  username: z.string({ required_error: 'Username is required.' }),
  password: z.string({ required_error: 'Password is required.' }),
  role: z.string({ required_error: 'Role is required.' }),
});

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export interface TokenResponse {
  token: string;
}

@Controller('auth')
export class AuthController {
  private logger = new Logger('AuthController');

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  /**
   * Issue a bearer token for the configured demo credentials.
   * Credentials are checked before the role.
   */
  @Post('token')
  @HttpCode(HttpStatus.OK)
  generateToken(@Body() body: unknown, @Ip() ip: string): TokenResponse {
    const request = unwrapResult(validateRequest(body, tokenRequestSchema));
    const credentials = this.configService.get('auth', { infer: true });

    if (request.username !== credentials.username || request.password !== credentials.password) {
      throw new UnauthorizedError('Invalid credentials');
    }

    if (!isRole(request.role)) {
      throw new ValidationError(`Role must be one of: ${ROLES.join(', ')}`);
    }

    const token = generateToken(
      { userId: request.username, role: request.role },
      this.configService.get('jwt', { infer: true })
    );

    this.logger.info(`Auth token created for ${request.username} with role ${request.role} from ${ip}`);
    return { token };
  }
}
