import { describe, it, expect } from 'vitest';
import { CloudFormationGenerator } from '../cloudformation-generator';
import { normalizeDeploymentSpec } from '../../config/validator';

const backend = {
  built_artifacts_path: 'dist',
  runtime: 'nodejs18.x',
  port: 3000,
  startup_script: 'run.sh'
};

const frontend = {
  built_assets_path: 'web'
};

describe('CloudFormationGenerator', () => {
  const generator = new CloudFormationGenerator();

  describe('backend', () => {
    const spec = normalizeDeploymentSpec({
      project_name: 'api1',
      deployment_type: 'backend',
      project_root: '/work/api1',
      backend_configuration: backend
    });

    it('should wrap the function with the Lambda Web Adapter', () => {
      const template = generator.generate(spec);

      expect(template.Resources.WebFunction.Properties).toMatchObject({
        FunctionName: 'api1-function',
        Handler: 'run.sh',
        Runtime: 'nodejs18.x',
        MemorySize: 512,
        Timeout: 30,
        Architectures: ['x86_64'],
        Layers: [
          { 'Fn::Sub': 'arn:aws:lambda:${AWS::Region}:753240598075:layer:LambdaAdapterLayerX86:25' }
        ],
        Code: {
          S3Bucket: { Ref: 'CodeS3Bucket' },
          S3Key: { Ref: 'CodeS3Key' }
        },
        Environment: {
          Variables: {
            AWS_LAMBDA_EXEC_WRAPPER: '/opt/bootstrap',
            PORT: '3000',
            AWS_LWA_PORT: '3000',
            AWS_LWA_REMOVE_BASE_PATH: '/prod'
          }
        }
      });
    });

    it('should declare the role, log group and HTTP API', () => {
      const template = generator.generate(spec);

      expect(Object.keys(template.Resources).sort()).toEqual([
        'FunctionLogGroup',
        'FunctionRole',
        'HttpApi',
        'HttpApiDefaultRoute',
        'HttpApiIntegration',
        'HttpApiInvokePermission',
        'HttpApiStage',
        'WebFunction'
      ]);
      expect(template.Resources.FunctionLogGroup.Properties?.LogGroupName).toBe('/aws/lambda/api1-function');
      expect(template.Resources.HttpApiStage.Properties?.StageName).toBe('prod');
      expect(template.Resources.HttpApiDefaultRoute.Properties?.RouteKey).toBe('$default');
      expect(Object.keys(template.Parameters)).toEqual(['CodeS3Bucket', 'CodeS3Key']);
    });

    it('should output the function ARN and API endpoint', () => {
      const template = generator.generate(spec);

      expect(template.Outputs.FunctionArn.Value).toEqual({ 'Fn::GetAtt': ['WebFunction', 'Arn'] });
      expect(template.Outputs.ApiEndpoint.Value).toEqual({
        'Fn::Sub': 'https://${HttpApi}.execute-api.${AWS::Region}.${AWS::URLSuffix}/prod'
      });
    });

    it('should use the arm64 adapter layer for arm64 functions', () => {
      const template = generator.generate(normalizeDeploymentSpec({
        project_name: 'api1',
        deployment_type: 'backend',
        project_root: '/work/api1',
        backend_configuration: { ...backend, architecture: 'arm64' }
      }));

      expect(template.Resources.WebFunction.Properties?.Layers).toEqual([
        { 'Fn::Sub': 'arn:aws:lambda:${AWS::Region}:753240598075:layer:LambdaAdapterLayerArm64:25' }
      ]);
    });

    it('should keep adapter variables over user environment', () => {
      const template = generator.generate(normalizeDeploymentSpec({
        project_name: 'api1',
        deployment_type: 'backend',
        project_root: '/work/api1',
        backend_configuration: { ...backend, environment: { PORT: '9999', GREETING: 'hello' } }
      }));

      expect(template.Resources.WebFunction.Properties?.Environment).toEqual({
        Variables: {
          GREETING: 'hello',
          AWS_LWA_REMOVE_BASE_PATH: '/prod',
          AWS_LAMBDA_EXEC_WRAPPER: '/opt/bootstrap',
          PORT: '3000',
          AWS_LWA_PORT: '3000'
        }
      });
    });

    it('should add a table, its access policy and TABLE_NAME', () => {
      const template = generator.generate(normalizeDeploymentSpec({
        project_name: 'api1',
        deployment_type: 'backend',
        project_root: '/work/api1',
        backend_configuration: {
          ...backend,
          database_configuration: {
            table_name: 'api1-items',
            attribute_definitions: [{ name: 'id', type: 'S' }],
            key_schema: [{ name: 'id', type: 'HASH' }]
          }
        }
      }));

      expect(template.Resources.DataTable).toEqual({
        Type: 'AWS::DynamoDB::Table',
        Properties: {
          TableName: 'api1-items',
          AttributeDefinitions: [{ AttributeName: 'id', AttributeType: 'S' }],
          KeySchema: [{ AttributeName: 'id', KeyType: 'HASH' }],
          BillingMode: 'PAY_PER_REQUEST',
          Tags: [
            { Key: 'webapp-deployer:project', Value: 'api1' },
            { Key: 'webapp-deployer:type', Value: 'backend' },
            { Key: 'ManagedBy', Value: 'webapp-deployer' }
          ]
        }
      });
      expect(template.Resources.WebFunction.Properties?.Environment).toMatchObject({
        Variables: { TABLE_NAME: { Ref: 'DataTable' } }
      });
      expect(template.Resources.FunctionRole.Properties?.Policies).toHaveLength(1);
      expect(template.Outputs.TableName.Value).toEqual({ Ref: 'DataTable' });
    });

    it('should omit CORS when disabled', () => {
      const template = generator.generate(normalizeDeploymentSpec({
        project_name: 'api1',
        deployment_type: 'backend',
        project_root: '/work/api1',
        backend_configuration: { ...backend, cors: false }
      }));

      expect(template.Resources.HttpApi.Properties?.CorsConfiguration).toBeUndefined();
    });
  });

  describe('frontend', () => {
    const spec = normalizeDeploymentSpec({
      project_name: 'site1',
      deployment_type: 'frontend',
      project_root: '/work/site1',
      frontend_configuration: frontend
    });

    it('should declare a private bucket behind a distribution', () => {
      const template = generator.generate(spec);

      expect(Object.keys(template.Resources).sort()).toEqual([
        'Distribution',
        'WebsiteBucket',
        'WebsiteBucketPolicy',
        'WebsiteOriginAccessControl'
      ]);
      expect(template.Parameters).toEqual({});
      expect(template.Resources.WebsiteBucket.Properties?.PublicAccessBlockConfiguration).toEqual({
        BlockPublicAcls: true,
        BlockPublicPolicy: true,
        IgnorePublicAcls: true,
        RestrictPublicBuckets: true
      });
    });

    it('should route unknown paths to the index document', () => {
      const template = generator.generate(spec);

      expect(template.Resources.Distribution.Properties?.DistributionConfig).toMatchObject({
        DefaultRootObject: 'index.html',
        ViewerCertificate: { CloudFrontDefaultCertificate: true },
        CustomErrorResponses: [
          { ErrorCode: 403, ResponseCode: 200, ResponsePagePath: '/index.html', ErrorCachingMinTTL: 0 },
          { ErrorCode: 404, ResponseCode: 200, ResponsePagePath: '/index.html', ErrorCachingMinTTL: 0 }
        ]
      });
    });

    it('should serve a configured error document with a 404', () => {
      const template = generator.generate(normalizeDeploymentSpec({
        project_name: 'site1',
        deployment_type: 'frontend',
        project_root: '/work/site1',
        frontend_configuration: { ...frontend, error_document: 'missing.html' }
      }));

      expect(template.Resources.Distribution.Properties?.DistributionConfig).toMatchObject({
        CustomErrorResponses: [
          { ErrorCode: 403, ResponseCode: 404, ResponsePagePath: '/missing.html' },
          { ErrorCode: 404, ResponseCode: 404, ResponsePagePath: '/missing.html' }
        ]
      });
    });

    it('should declare the alias and certificate for a custom domain', () => {
      const template = generator.generate(normalizeDeploymentSpec({
        project_name: 'site1',
        deployment_type: 'frontend',
        project_root: '/work/site1',
        frontend_configuration: {
          ...frontend,
          custom_domain: 'www.example.com',
          certificate_arn: 'arn:aws:acm:us-east-1:123456789012:certificate/abc'
        }
      }));

      expect(template.Resources.Distribution.Properties?.DistributionConfig).toMatchObject({
        Aliases: ['www.example.com'],
        ViewerCertificate: {
          AcmCertificateArn: 'arn:aws:acm:us-east-1:123456789012:certificate/abc',
          SslSupportMethod: 'sni-only',
          MinimumProtocolVersion: 'TLSv1.2_2021'
        }
      });
      expect(template.Outputs.WebsiteUrl.Value).toBe('https://www.example.com');
    });
  });

  describe('fullstack', () => {
    it('should send /api/* to the HTTP API without caching', () => {
      const template = generator.generate(normalizeDeploymentSpec({
        project_name: 'shop',
        deployment_type: 'fullstack',
        project_root: '/work/shop',
        backend_configuration: { ...backend, stage: 'live' },
        frontend_configuration: frontend
      }));

      expect(template.Resources.Distribution.Properties?.DistributionConfig).toMatchObject({
        Origins: [
          { Id: 'S3Origin' },
          {
            Id: 'ApiOrigin',
            DomainName: { 'Fn::Sub': '${HttpApi}.execute-api.${AWS::Region}.${AWS::URLSuffix}' },
            OriginPath: '/live'
          }
        ],
        CacheBehaviors: [
          {
            PathPattern: '/api/*',
            TargetOriginId: 'ApiOrigin',
            CachePolicyId: '4135ea2d-6df8-44a3-9df3-4b5a84be39ad',
            OriginRequestPolicyId: 'b689b0a8-53d0-40ab-baf2-68738e2966ac'
          }
        ],
        DefaultCacheBehavior: { TargetOriginId: 'S3Origin' }
      });
      expect(template.Resources.WebFunction).toBeDefined();
      expect(template.Resources.WebsiteBucket).toBeDefined();
    });

    it('should leave API error responses untouched', () => {
      const template = generator.generate(normalizeDeploymentSpec({
        project_name: 'shop',
        deployment_type: 'fullstack',
        project_root: '/work/shop',
        backend_configuration: backend,
        frontend_configuration: frontend
      }));

      const config = template.Resources.Distribution.Properties?.DistributionConfig;
      expect(config).toBeDefined();
      expect(config).not.toHaveProperty('CustomErrorResponses');
    });
  });

  it('should produce identical documents for identical specs', () => {
    const spec = normalizeDeploymentSpec({
      project_name: 'shop',
      deployment_type: 'fullstack',
      project_root: '/work/shop',
      backend_configuration: backend,
      frontend_configuration: frontend
    });

    expect(JSON.stringify(generator.generate(spec))).toBe(JSON.stringify(generator.generate(spec)));
  });
});
