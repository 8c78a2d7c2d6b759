import { describe, it, expect } from 'vitest';
import { isOperationAllowed } from '../capabilities';

const readOnly = { allowWrite: false, allowSensitiveDataAccess: false };

describe('Operation capabilities', () => {
  it('should refuse mutations without write access', () => {
    expect(isOperationAllowed('deploy_webapp', readOnly).allowed).toBe(false);
    expect(isOperationAllowed('configure_domain', readOnly).allowed).toBe(false);
    expect(isOperationAllowed('update_frontend', readOnly).allowed).toBe(false);
    expect(isOperationAllowed('delete_deployment', readOnly).allowed).toBe(false);
  });

  it('should allow mutations with write access', () => {
    expect(isOperationAllowed('deploy_webapp', { ...readOnly, allowWrite: true }).allowed).toBe(true);
  });

  it('should gate logs behind sensitive data access only', () => {
    expect(isOperationAllowed('get_logs', { ...readOnly, allowWrite: true }).allowed).toBe(false);
    expect(isOperationAllowed('get_logs', { ...readOnly, allowSensitiveDataAccess: true }).allowed).toBe(true);
  });

  it('should always allow read-only operations', () => {
    expect(isOperationAllowed('list_deployments', readOnly).allowed).toBe(true);
    expect(isOperationAllowed('get_metrics', readOnly).allowed).toBe(true);
    expect(isOperationAllowed('deployment_help', readOnly).allowed).toBe(true);
  });

  it('should explain a refusal', () => {
    expect(isOperationAllowed('delete_deployment', readOnly)).toEqual({
      allowed: false,
      reason: 'delete_deployment changes AWS resources and requires write access (--allow-write)'
    });
  });
});
