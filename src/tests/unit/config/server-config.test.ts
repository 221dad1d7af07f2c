import { DEFAULT_HOST, DEFAULT_PORT } from '../../../config/env';
import { parsePort, ServerConfig } from '../../../config/server-config';
import { TypeMismatchError } from '../../../errors';

describe('ServerConfig', () => {
  it('should keep valid values unchanged', () => {
    const config = new ServerConfig('localhost', 8000);

    expect(config.host).toBe('localhost');
    expect(config.port).toBe(8000);
    expect(config.toJSON()).toEqual({ host: 'localhost', port: 8000 });
  });

  it('should reject a non-string host at construction', () => {
    expect(() => new ServerConfig(127001, 8000)).toThrow('Expected string for host');
  });

  it('should reject a non-integer port at construction', () => {
    expect(() => new ServerConfig('localhost', '8000')).toThrow('Expected integer for port');
    expect(() => new ServerConfig('localhost', 80.5)).toThrow(TypeMismatchError);
  });

  it('should validate later mutations', () => {
    const config = new ServerConfig('localhost', 8000);

    config.setHost('mail.internal');
    config.setPort(2525);
    expect(config.host).toBe('mail.internal');
    expect(config.port).toBe(2525);

    expect(() => config.setHost(null)).toThrow('Expected string for host');
    expect(() => config.setPort('2525')).toThrow('Expected integer for port');
    expect(config.host).toBe('mail.internal');
    expect(config.port).toBe(2525);
  });

  it('should render a readable description', () => {
    expect(String(new ServerConfig('localhost', 8000))).toBe(
      "ServerConfig(host='localhost', port=8000)",
    );
  });

  describe('fromEnv', () => {
    it('should fall back to the defaults', () => {
      const config = ServerConfig.fromEnv({});
      expect(config.host).toBe(DEFAULT_HOST);
      expect(config.port).toBe(DEFAULT_PORT);
    });

    it('should read SERVICE_HOST and SERVICE_PORT', () => {
      const config = ServerConfig.fromEnv({ SERVICE_HOST: 'notify.local', SERVICE_PORT: '9090' });
      expect(config.host).toBe('notify.local');
      expect(config.port).toBe(9090);
    });

    it('should reject a non-numeric SERVICE_PORT', () => {
      expect(() => ServerConfig.fromEnv({ SERVICE_PORT: 'eighty' })).toThrow(
        'Expected integer for port',
      );
    });
  });
});

describe('parsePort', () => {
  it('should convert integer text', () => {
    expect(parsePort('8000')).toBe(8000);
    expect(parsePort(' 42 ')).toBe(42);
  });

  it('should pass other input through for the port check to reject', () => {
    expect(parsePort('80.5')).toBe('80.5');
    expect(parsePort(3000)).toBe(3000);
  });
});
