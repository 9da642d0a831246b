import { cleanPincode, extractPincodeFromText } from './pincode.util';

describe('pincode.util', () => {
  describe('cleanPincode', () => {
    it('should keep a plain six-digit pincode', () => {
      expect(cleanPincode('400001')).toBe('400001');
    });

    it('should strip separators and surrounding whitespace', () => {
      expect(cleanPincode('110-001')).toBe('110001');
      expect(cleanPincode('  560 034 ')).toBe('560034');
      expect(cleanPincode('PIN: 682-001.')).toBe('682001');
    });

    it('should preserve leading zeros', () => {
      expect(cleanPincode('012345')).toBe('012345');
    });

    // Test: Digit count other than six is rejected rather than truncated
    it('should return empty string when the digit count is not six', () => {
      expect(cleanPincode('11 001')).toBe('');
      expect(cleanPincode('4000011')).toBe('');
      expect(cleanPincode('no digits')).toBe('');
      expect(cleanPincode('')).toBe('');
    });

    it('should treat missing input as empty', () => {
      expect(cleanPincode(null)).toBe('');
      expect(cleanPincode(undefined)).toBe('');
    });

    it('should be idempotent', () => {
      const samples = ['110-001', '11 001', 'abc', '400 0 01', '0000001', ''];
      for (const sample of samples) {
        expect(cleanPincode(cleanPincode(sample))).toBe(cleanPincode(sample));
      }
    });
  });

  describe('extractPincodeFromText', () => {
    it('should find a standalone six-digit run', () => {
      expect(extractPincodeFromText('12 MG Road, Pune 411001, Maharashtra')).toBe('411001');
    });

    it('should join a pincode split by a space', () => {
      expect(extractPincodeFromText('Address near 110 001 Delhi')).toBe('110001');
    });

    it('should join a pincode split by a hyphen', () => {
      expect(extractPincodeFromText('Sector 5, Noida-201-301')).toBe('201301');
    });

    // Test: A six-digit run wins over an earlier 3+3 form
    it('should prefer a standalone run over a split form', () => {
      expect(extractPincodeFromText('Flat 123 456, Chennai 600028')).toBe('600028');
    });

    it('should not match digits embedded in longer runs or words', () => {
      expect(extractPincodeFromText('Phone 9876543210')).toBe('');
      expect(extractPincodeFromText('Order AB123456')).toBe('');
    });

    it('should return empty string when nothing matches', () => {
      expect(extractPincodeFromText('House 12, Lane 4, Kochi')).toBe('');
      expect(extractPincodeFromText('')).toBe('');
      expect(extractPincodeFromText(null)).toBe('');
      expect(extractPincodeFromText(undefined)).toBe('');
    });
  });
});
