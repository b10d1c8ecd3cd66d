import { describe, it, expect } from 'vitest';
import { parseWarning } from '../../src/warnings/warningParser';
import { MalformedWarningError } from '../../src/utils/errors';

describe('warningParser', () => {
  describe('namespace warnings', () => {
    it('should extract namespace and level', () => {
      const parsed = parseWarning(
        'existing pods in namespace "p0t-sekurity" violate the new PodSecurity enforce level "restricted:latest"'
      );

      expect(parsed).toEqual({ kind: 'namespace', namespace: 'p0t-sekurity', level: 'restricted:latest' });
    });

    it('should reject a namespace warning with an extra quoted segment', () => {
      const text =
        'existing pods in namespace "team-a" violate the new PodSecurity enforce level "baseline:latest" "extra"';

      expect(() => parseWarning(text)).toThrow(MalformedWarningError);
      expect(() => parseWarning(text)).toThrow('Namespace warning has 3 quoted segment(s), expected 2');
    });

    it('should reject a namespace warning with a single quoted segment', () => {
      expect(() => parseWarning('existing pods in namespace "team-a" violate something')).toThrow(
        'Namespace warning has 1 quoted segment(s), expected 2'
      );
    });

    it('should reject reworded namespace warnings even with two quoted segments', () => {
      const text = 'existing pods in namespace "team-a" would break under "restricted:latest"';

      expect(() => parseWarning(text)).toThrow('Namespace warning does not match the expected wording');
    });
  });

  describe('pod warnings', () => {
    it('should split pod name and violations', () => {
      const parsed = parseWarning('p0t-sekurity: allowPrivilegeEscalation != false, unrestricted capabilities');

      expect(parsed).toEqual({
        kind: 'pod',
        name: 'p0t-sekurity',
        violations: ['allowPrivilegeEscalation != false', 'unrestricted capabilities']
      });
    });

    it('should trim the pod name', () => {
      const parsed = parseWarning('  web-7d9f8  : runAsNonRoot != true');

      expect(parsed).toEqual({ kind: 'pod', name: 'web-7d9f8', violations: ['runAsNonRoot != true'] });
    });

    it('should split only on the first separator', () => {
      const parsed = parseWarning('web-1: seccompProfile (pod must not set type: Unconfined), hostPath volumes');

      expect(parsed).toEqual({
        kind: 'pod',
        name: 'web-1',
        violations: ['seccompProfile (pod must not set type: Unconfined)', 'hostPath volumes']
      });
    });

    it('should keep duplicate violations', () => {
      const parsed = parseWarning('web-1: hostPort, hostPort');

      expect(parsed).toEqual({ kind: 'pod', name: 'web-1', violations: ['hostPort', 'hostPort'] });
    });

    it('should reject text without a separator', () => {
      expect(() => parseWarning('something went sideways')).toThrow('Pod warning has no ": " separator');
    });

    it('should reject an empty pod name', () => {
      expect(() => parseWarning('   : hostPort')).toThrow('Pod warning has an empty pod name');
    });

    it('should reject an empty violation list', () => {
      expect(() => parseWarning('web-1: ')).toThrow('Pod warning lists no violations');
    });
  });
});
