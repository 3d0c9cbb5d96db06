import { Logger, NotFoundException } from '@nestjs/common';
import { LogServiceErrors } from './log-service-errors.decorator';

class AccountsService {
  @LogServiceErrors('sign_in')
  async signIn(input: { email: string; password: string }): Promise<string> {
    if (input.email === 'missing@example.com') {
      throw new NotFoundException('No such account');
    }
    throw new Error('database offline');
  }

  @LogServiceErrors('echo')
  async echo(value: number): Promise<number> {
    return value;
  }
}

describe('LogServiceErrors', () => {
  afterEach(() => jest.restoreAllMocks());

  it('passes results through', async () => {
    await expect(new AccountsService().echo(4)).resolves.toBe(4);
  });

  it('logs client errors as warnings with scrubbed arguments', async () => {
    const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    await expect(
      new AccountsService().signIn({ email: 'missing@example.com', password: 'test-secret' }),
    ).rejects.toBeInstanceOf(NotFoundException);

    expect(warn).toHaveBeenCalledWith({
      event: 'service_error',
      operation: 'sign_in',
      service: 'AccountsService',
      method: 'signIn',
      args: [{ email: 'missing@example.com', password: '<redacted>' }],
      detail: 'No such account',
      statusCode: 404,
    });
  });

  it('logs unexpected errors with their stack', async () => {
    const error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    await expect(
      new AccountsService().signIn({ email: 'ada@example.com', password: 'test-secret' }),
    ).rejects.toThrow('database offline');

    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'service_unexpected_error', error: 'database offline' }),
      expect.stringContaining('database offline'),
    );
  });
});
