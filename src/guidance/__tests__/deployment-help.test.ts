import { describe, it, expect } from 'vitest';
import { deploymentHelp } from '../deployment-help';
import { normalizeDeploymentSpec } from '../../config/validator';
import { InvalidSpecError } from '../../errors';

describe('deploymentHelp', () => {
  it('should return the general help without a type', () => {
    const help = deploymentHelp();

    expect(Object.keys(help.deploymentTypes)).toEqual(['backend', 'frontend', 'fullstack']);
    expect(help.workflow).toHaveLength(7);
    expect(help.specificHelp).toBeUndefined();
  });

  it('should add the part for one deployment type', () => {
    const help = deploymentHelp('frontend');

    expect(help.specificHelp?.description).toBe(
      'Frontend deployments use Amazon S3 for storage and CloudFront for content delivery.'
    );
    expect(help.specificHelp?.supportedFrameworks).toContain('React');
  });

  it('should ship examples that are valid deployment specs', () => {
    for (const type of ['backend', 'frontend', 'fullstack']) {
      const example = deploymentHelp(type).specificHelp?.example;

      expect(() => normalizeDeploymentSpec(example)).not.toThrow();
    }
  });

  it('should reject an unknown deployment type', () => {
    expect(() => deploymentHelp('mobile')).toThrow(
      new InvalidSpecError('Unknown deployment type mobile; expected one of backend, frontend, fullstack')
    );
  });
});
