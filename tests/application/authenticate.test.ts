import { describe, it, expect } from 'vitest';
import { authenticate, parseBasicAuthorization } from '../../src/application/index.js';
import { basicAuth } from '../helpers.js';

const credentials = { user: 'test', password: 'pwd' };

describe('parseBasicAuthorization', () => {
  it('splits user and password at the first colon', () => {
    expect(parseBasicAuthorization(basicAuth('test', 'p:w:d'))).toEqual({ user: 'test', password: 'p:w:d' });
  });

  it('accepts the scheme in any case', () => {
    expect(parseBasicAuthorization(`basic ${Buffer.from('test:pwd').toString('base64')}`)).toEqual(credentials);
  });

  it('rejects a token that is not strict base64', () => {
    expect(parseBasicAuthorization('Basic meh')).toBeNull();
  });

  it('rejects a token without a colon', () => {
    expect(parseBasicAuthorization(`Basic ${Buffer.from('testpwd').toString('base64')}`)).toBeNull();
  });

  it('rejects other schemes', () => {
    expect(parseBasicAuthorization('Bearer dGVzdDpwd2Q=')).toBeNull();
  });
});

describe('authenticate', () => {
  it('lets every request through without configured credentials', () => {
    expect(authenticate(undefined, undefined)).toBe(true);
  });

  it('fails without an authorization header', () => {
    expect(authenticate(undefined, credentials)).toBe(false);
  });

  it('fails with a malformed header', () => {
    expect(authenticate('Basic meh', credentials)).toBe(false);
  });

  it('fails with a wrong password', () => {
    expect(authenticate(basicAuth('test', 'nope'), credentials)).toBe(false);
  });

  it('fails with a wrong user', () => {
    expect(authenticate(basicAuth('other', 'pwd'), credentials)).toBe(false);
  });

  it('passes with the configured pair', () => {
    expect(authenticate(basicAuth('test', 'pwd'), credentials)).toBe(true);
  });
});
