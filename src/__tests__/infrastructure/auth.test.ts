import { Wallet } from 'ethers';
import { UserRole, User } from '../../domain/entities/User';
import { ErrorCode } from '../../domain/errors/AppError';
import { JwtService, parseExpiry } from '../../infrastructure/auth/JwtService';
import { SignatureAuthService } from '../../infrastructure/auth/SignatureAuthService';
import { ADMIN_KEY, ALICE_KEY, BOB_KEY, ManualClock, T0 } from '../helpers/fixtures';

describe('parseExpiry', () => {
  it('should read plain seconds and unit suffixes', () => {
    expect(parseExpiry('900')).toBe(900);
    expect(parseExpiry('15m')).toBe(900);
    expect(parseExpiry('2h')).toBe(7200);
    expect(parseExpiry(' 7d ')).toBe(604800);
  });

  it('should reject other formats', () => {
    expect(() => parseExpiry('1w')).toThrow('Invalid token expiry: 1w');
  });
});

describe('JwtService', () => {
  const alice = new Wallet(ALICE_KEY);
  let service: JwtService;

  beforeEach(() => {
    service = new JwtService();
  });

  it('should issue tokens that verify back to the user', () => {
    const tokens = service.generateTokens(new User(alice.address, UserRole.PARTICIPANT));

    expect(tokens.expiresIn).toBe(900);
    expect(service.verifyAccessToken(tokens.accessToken)).toEqual({
      address: alice.address,
      role: UserRole.PARTICIPANT
    });
    expect(service.verifyRefreshToken(tokens.refreshToken).address).toBe(alice.address);
  });

  it('should not accept one kind of token as the other', () => {
    const tokens = service.generateTokens(new User(alice.address, UserRole.ADMIN));

    expect(() => service.verifyAccessToken(tokens.refreshToken)).toThrow('Invalid access token');
    expect(() => service.verifyRefreshToken(tokens.accessToken)).toThrow('Invalid refresh token');
  });

  it('should refuse to start without secrets', () => {
    const saved = process.env.JWT_ACCESS_SECRET;
    delete process.env.JWT_ACCESS_SECRET;
    try {
      expect(() => new JwtService()).toThrow('JWT secrets must be configured');
    } finally {
      process.env.JWT_ACCESS_SECRET = saved;
    }
  });
});

describe('SignatureAuthService', () => {
  const admin = new Wallet(ADMIN_KEY);
  const alice = new Wallet(ALICE_KEY);
  const bob = new Wallet(BOB_KEY);
  let clock: ManualClock;
  let service: SignatureAuthService;

  beforeEach(() => {
    clock = new ManualClock(T0);
    service = new SignatureAuthService(clock);
  });

  it('should issue a challenge naming the checksummed address', () => {
    const challenge = service.issueChallenge(alice.address.toLowerCase());

    expect(challenge.address).toBe(alice.address);
    expect(challenge.expiresAt).toBe(T0 + 300);
    expect(challenge.message.startsWith(`Sign in to BetMe escrow\nAddress: ${alice.address}\nNonce: 0x`)).toBe(true);
    expect(challenge.message.endsWith(`\nIssued At: ${T0}`)).toBe(true);
  });

  it('should log in the signer as a participant', async () => {
    const challenge = service.issueChallenge(alice.address);
    const signature = await alice.signMessage(challenge.message);

    const user = service.verifyChallenge(alice.address, signature);
    expect(user.address).toBe(alice.address);
    expect(user.role).toBe(UserRole.PARTICIPANT);
  });

  it('should grant the admin role to configured addresses', async () => {
    const challenge = service.issueChallenge(admin.address);
    const user = service.verifyChallenge(admin.address, await admin.signMessage(challenge.message));

    expect(user.role).toBe(UserRole.ADMIN);
  });

  it('should reject a signature from another key and burn the challenge', async () => {
    const challenge = service.issueChallenge(alice.address);
    const forged = await bob.signMessage(challenge.message);

    expect(() => service.verifyChallenge(alice.address, forged)).toThrow('Signature does not match address');

    const genuine = await alice.signMessage(challenge.message);
    expect(() => service.verifyChallenge(alice.address, genuine)).toThrow('No pending challenge for this address');
  });

  it('should reject expired challenges', async () => {
    const challenge = service.issueChallenge(alice.address);
    const signature = await alice.signMessage(challenge.message);
    clock.advance(301);

    let caught: unknown;
    try {
      service.verifyChallenge(alice.address, signature);
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: ErrorCode.UNAUTHORIZED, message: 'No pending challenge for this address' });
  });

  it('should reject malformed signatures', () => {
    service.issueChallenge(alice.address);

    expect(() => service.verifyChallenge(alice.address, '0x1234')).toThrow('Invalid signature');
  });
});
