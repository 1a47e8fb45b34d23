import { Endpoint } from './endpoint';

describe('Endpoint', () => {
  describe('presets', () => {
    it('should point at the production and sandbox hosts', () => {
      expect(Endpoint.production().toString()).toBe('api.push.apple.com:443');
      expect(Endpoint.productionAlternate().toString()).toBe('api.push.apple.com:2197');
      expect(Endpoint.development().toString()).toBe('api.sandbox.push.apple.com:443');
      expect(Endpoint.developmentAlternate().toString()).toBe('api.sandbox.push.apple.com:2197');
    });

    it('should build the https base url', () => {
      expect(Endpoint.development().toUrl()).toBe('https://api.sandbox.push.apple.com:443');
    });
  });

  describe('parse', () => {
    it('should parse host:port', () => {
      const endpoint = Endpoint.parse('localhost:8443');

      expect(endpoint).not.toBeNull();
      expect(endpoint?.host).toBe('localhost');
      expect(endpoint?.port).toBe(8443);
    });

    it('should round trip a preset through its string form', () => {
      expect(Endpoint.parse(Endpoint.productionAlternate().toString())).toEqual(Endpoint.productionAlternate());
    });

    it.each([
      ['api.push.apple.com'],
      ['https://api.push.apple.com:443'],
      [':443'],
      ['host:'],
      ['host:port'],
      ['host:0'],
      ['host:70000'],
      ['host:-1'],
    ])('should reject %s', (value) => {
      expect(Endpoint.parse(value)).toBeNull();
    });
  });

  describe('fromName', () => {
    it('should resolve preset names', () => {
      expect(Endpoint.fromName('production')).toEqual(Endpoint.production());
      expect(Endpoint.fromName('production-alternate')).toEqual(Endpoint.productionAlternate());
      expect(Endpoint.fromName('development')).toEqual(Endpoint.development());
      expect(Endpoint.fromName('sandbox')).toEqual(Endpoint.development());
      expect(Endpoint.fromName('Development-Alternate')).toEqual(Endpoint.developmentAlternate());
    });

    it('should fall back to host:port', () => {
      expect(Endpoint.fromName('push.test:9000')).toEqual(new Endpoint('push.test', 9000));
      expect(Endpoint.fromName('staging')).toBeNull();
    });
  });
});
