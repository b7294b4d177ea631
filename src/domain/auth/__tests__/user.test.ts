import { describe, it, expect } from 'vitest';
import { toUserResponse, User } from '../user.js';

describe('toUserResponse', () => {
  const user: User = {
    id: '4f8c2a9e-3b1d-4c6a-9e2f-1a2b3c4d5e6f',
    username: 'alice',
    email: 'a@x.com',
    passwordHash: '$argon2id$v=19$m=1024,t=2,p=4$c2FsdA$aGFzaA',
    firstName: 'Alice',
    lastName: null,
    isActive: true,
    isVerified: false,
    createdAt: new Date('2024-01-01T10:00:00.000Z'),
    updatedAt: new Date('2024-01-02T10:00:00.000Z'),
  };

  it('should project every field except the password hash', () => {
    expect(toUserResponse(user)).toEqual({
      id: '4f8c2a9e-3b1d-4c6a-9e2f-1a2b3c4d5e6f',
      username: 'alice',
      email: 'a@x.com',
      firstName: 'Alice',
      lastName: null,
      isActive: true,
      isVerified: false,
      createdAt: '2024-01-01T10:00:00.000Z',
      updatedAt: '2024-01-02T10:00:00.000Z',
    });
  });

  it('should not carry the hash under any key', () => {
    const json = JSON.stringify(toUserResponse(user));

    expect(toUserResponse(user)).not.toHaveProperty('passwordHash');
    expect(json).not.toContain(user.passwordHash);
  });
});
