import { BadRequestException, ValidationPipe } from '@nestjs/common';

import { UsernameParamDto } from '../dto/user-activity.dto.js';

describe('UsernameParamDto', () => {
  const pipe = new ValidationPipe({ whitelist: true, transform: true });
  const validate = (username: string) =>
    pipe.transform({ username }, { type: 'param', metatype: UsernameParamDto });

  it.each(['octocat', 'a-b', 'A1', 'a'.repeat(39)])('accepts %s', async (username) => {
    const params = await validate(username);
    expect(params).toBeInstanceOf(UsernameParamDto);
    expect(params.username).toBe(username);
  });

  it.each(['-bad', 'bad-', 'a--b', 'a_b', 'a'.repeat(40)])('rejects %s with 400', async (username) => {
    await expect(validate(username)).rejects.toBeInstanceOf(BadRequestException);
  });

  it('explains the rejection', async () => {
    await expect(validate('a_b')).rejects.toMatchObject({
      response: { statusCode: 400, message: ['username must be a valid GitHub login'] },
    });
  });
});
