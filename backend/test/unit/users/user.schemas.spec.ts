import { describe, it, expect } from 'vitest';
import {
  createUserSchema,
  updateUserSchema,
  userIdParamsSchema,
} from '../../../src/modules/users/user.schemas';

function createBody(username: string) {
  return {
    username,
    email: 'someone@example.com',
    first_name: 'Some',
    last_name: 'One',
  };
}

describe('createUserSchema', () => {
  it('applies role and active defaults', () => {
    const parsed = createUserSchema.parse(createBody('alice'));

    expect(parsed.role).toBe('user');
    expect(parsed.active).toBe(true);
  });

  it('counts username length in characters, not UTF-16 units', () => {
    // each emoji is one character but two UTF-16 units
    expect(createUserSchema.safeParse(createBody('😀'.repeat(26))).success).toBe(true);
    expect(createUserSchema.safeParse(createBody('😀'.repeat(50))).success).toBe(true);
    expect(createUserSchema.safeParse(createBody('😀'.repeat(51))).success).toBe(false);
    expect(createUserSchema.safeParse(createBody('😀😀')).success).toBe(false);
  });

  it('bounds plain ASCII usernames to 3..50', () => {
    expect(createUserSchema.safeParse(createBody('ab')).success).toBe(false);
    expect(createUserSchema.safeParse(createBody('a'.repeat(50))).success).toBe(true);
    expect(createUserSchema.safeParse(createBody('a'.repeat(51))).success).toBe(false);
  });
});

describe('updateUserSchema', () => {
  it('accepts an empty patch and checks present fields', () => {
    expect(updateUserSchema.parse({})).toEqual({});
    expect(updateUserSchema.safeParse({ first_name: '' }).success).toBe(false);
    expect(updateUserSchema.safeParse({ last_name: 'é'.repeat(100) }).success).toBe(true);
  });
});

describe('userIdParamsSchema', () => {
  it('accepts ids up to the int4 maximum', () => {
    expect(userIdParamsSchema.parse({ userId: '2147483647' })).toEqual({ userId: 2147483647 });
    expect(userIdParamsSchema.safeParse({ userId: '2147483648' }).success).toBe(false);
  });
});
