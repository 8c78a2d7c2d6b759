import { CloudFormationTemplate, TemplateGenerator, TemplateResource, TemplateValue } from './types';
import { DatabaseConfiguration, NormalizedDeploymentSpec } from '../types';
import { ResourceNamingService } from '../config/naming';
import { webAdapterEnvironment, webAdapterFunctionProperties } from './lambda-web-adapter';

type NormalizedBackend = NonNullable<NormalizedDeploymentSpec['backend_configuration']>;
type NormalizedFrontend = NonNullable<NormalizedDeploymentSpec['frontend_configuration']>;

// CloudFront managed policies
const CACHING_OPTIMIZED_POLICY_ID = '658327ea-f89d-4fab-a63d-7e88639e58f6';
const CACHING_DISABLED_POLICY_ID = '4135ea2d-6df8-44a3-9df3-4b5a84be39ad';
const ALL_VIEWER_EXCEPT_HOST_HEADER_POLICY_ID = 'b689b0a8-53d0-40ab-baf2-68738e2966ac';

export const CODE_BUCKET_PARAMETER = 'CodeS3Bucket';
export const CODE_KEY_PARAMETER = 'CodeS3Key';

/** Logical ids shared with the output extraction in the orchestrator */
export const OUTPUT_KEYS = {
  functionArn: 'FunctionArn',
  functionName: 'FunctionName',
  logGroupName: 'LogGroupName',
  apiEndpoint: 'ApiEndpoint',
  apiId: 'ApiId',
  tableName: 'TableName',
  bucketName: 'BucketName',
  distributionId: 'DistributionId',
  distributionDomain: 'DistributionDomain',
  websiteUrl: 'WebsiteUrl'
} as const;

export class CloudFormationGenerator implements TemplateGenerator {
  constructor(private readonly naming: ResourceNamingService = new ResourceNamingService()) {}

  generate(spec: NormalizedDeploymentSpec): CloudFormationTemplate {
    const template = this.createBaseTemplate(spec);

    switch (spec.deployment_type) {
      case 'frontend':
        this.addFrontendResources(template, spec, this.requireFrontend(spec));
        break;
      case 'backend':
        this.addBackendResources(template, spec, this.requireBackend(spec));
        break;
      case 'fullstack': {
        const backend = this.requireBackend(spec);
        this.addBackendResources(template, spec, backend);
        this.addFrontendResources(template, spec, this.requireFrontend(spec), backend);
        break;
      }
    }

    return template;
  }

  private requireBackend(spec: NormalizedDeploymentSpec): NormalizedBackend {
    if (!spec.backend_configuration) {
      throw new Error(`backend_configuration is required for ${spec.deployment_type} deployments`);
    }
    return spec.backend_configuration;
  }

  private requireFrontend(spec: NormalizedDeploymentSpec): NormalizedFrontend {
    if (!spec.frontend_configuration) {
      throw new Error(`frontend_configuration is required for ${spec.deployment_type} deployments`);
    }
    return spec.frontend_configuration;
  }

  private createBaseTemplate(spec: NormalizedDeploymentSpec): CloudFormationTemplate {
    return {
      AWSTemplateFormatVersion: '2010-09-09',
      Description: `Serverless ${spec.deployment_type} web application ${spec.project_name}`,
      Parameters: {},
      Resources: {},
      Outputs: {}
    };
  }

  private addBackendResources(
    template: CloudFormationTemplate,
    spec: NormalizedDeploymentSpec,
    backend: NormalizedBackend
  ): void {
    const names = this.naming.generateResourceNames(spec);
    const functionName = names.functionName ?? this.naming.generateFunctionName(spec.project_name);
    const logGroupName = names.logGroupName ?? `/aws/lambda/${functionName}`;

    template.Parameters[CODE_BUCKET_PARAMETER] = {
      Type: 'String',
      Description: 'Bucket holding the packaged function code'
    };
    template.Parameters[CODE_KEY_PARAMETER] = {
      Type: 'String',
      Description: 'Object key of the packaged function code'
    };

    template.Resources.FunctionLogGroup = {
      Type: 'AWS::Logs::LogGroup',
      Properties: {
        LogGroupName: logGroupName,
        RetentionInDays: 14
      }
    };

    template.Resources.FunctionRole = {
      Type: 'AWS::IAM::Role',
      Properties: {
        AssumeRolePolicyDocument: {
          Version: '2012-10-17',
          Statement: [
            {
              Effect: 'Allow',
              Principal: { Service: 'lambda.amazonaws.com' },
              Action: 'sts:AssumeRole'
            }
          ]
        },
        ManagedPolicyArns: [
          { 'Fn::Sub': 'arn:${AWS::Partition}:iam::aws:policy/service-role/AWSLambdaBasicExecutionRole' }
        ],
        Policies: backend.database_configuration ? [this.tableAccessPolicy()] : [],
        Tags: this.createTags(spec)
      }
    };

    if (backend.database_configuration) {
      template.Resources.DataTable = this.createTable(backend.database_configuration, spec);
      template.Outputs[OUTPUT_KEYS.tableName] = {
        Description: 'DynamoDB table name',
        Value: { Ref: 'DataTable' }
      };
    }

    template.Resources.WebFunction = {
      Type: 'AWS::Lambda::Function',
      DependsOn: ['FunctionLogGroup'],
      Properties: {
        ...webAdapterFunctionProperties({
          port: backend.port,
          memorySize: backend.memory_size,
          timeout: backend.timeout,
          runtime: backend.runtime,
          architecture: backend.architecture
        }),
        FunctionName: functionName,
        Handler: backend.startup_script,
        Role: { 'Fn::GetAtt': ['FunctionRole', 'Arn'] },
        Code: {
          S3Bucket: { Ref: CODE_BUCKET_PARAMETER },
          S3Key: { Ref: CODE_KEY_PARAMETER }
        },
        Environment: {
          Variables: this.functionEnvironment(backend)
        },
        Tags: this.createTags(spec)
      }
    };

    template.Resources.HttpApi = {
      Type: 'AWS::ApiGatewayV2::Api',
      Properties: {
        Name: names.apiName ?? `${spec.project_name}-api`,
        ProtocolType: 'HTTP',
        ...(backend.cors ? {
          CorsConfiguration: {
            AllowOrigins: ['*'],
            AllowMethods: ['*'],
            AllowHeaders: ['*']
          }
        } : {}),
        Tags: { 'webapp-deployer:project': spec.project_name }
      }
    };

    template.Resources.HttpApiIntegration = {
      Type: 'AWS::ApiGatewayV2::Integration',
      Properties: {
        ApiId: { Ref: 'HttpApi' },
        IntegrationType: 'AWS_PROXY',
        IntegrationUri: { 'Fn::GetAtt': ['WebFunction', 'Arn'] },
        PayloadFormatVersion: '2.0'
      }
    };

    template.Resources.HttpApiDefaultRoute = {
      Type: 'AWS::ApiGatewayV2::Route',
      Properties: {
        ApiId: { Ref: 'HttpApi' },
        RouteKey: '$default',
        Target: { 'Fn::Join': ['/', ['integrations', { Ref: 'HttpApiIntegration' }]] }
      }
    };

    template.Resources.HttpApiStage = {
      Type: 'AWS::ApiGatewayV2::Stage',
      Properties: {
        ApiId: { Ref: 'HttpApi' },
        StageName: backend.stage,
        AutoDeploy: true
      }
    };

    template.Resources.HttpApiInvokePermission = {
      Type: 'AWS::Lambda::Permission',
      Properties: {
        FunctionName: { Ref: 'WebFunction' },
        Action: 'lambda:InvokeFunction',
        Principal: 'apigateway.amazonaws.com',
        SourceArn: { 'Fn::Sub': 'arn:${AWS::Partition}:execute-api:${AWS::Region}:${AWS::AccountId}:${HttpApi}/*' }
      }
    };

    template.Outputs[OUTPUT_KEYS.functionArn] = {
      Description: 'ARN of the web function',
      Value: { 'Fn::GetAtt': ['WebFunction', 'Arn'] }
    };
    template.Outputs[OUTPUT_KEYS.functionName] = {
      Description: 'Name of the web function',
      Value: { Ref: 'WebFunction' }
    };
    template.Outputs[OUTPUT_KEYS.logGroupName] = {
      Description: 'Log group of the web function',
      Value: { Ref: 'FunctionLogGroup' }
    };
    template.Outputs[OUTPUT_KEYS.apiId] = {
      Description: 'HTTP API id',
      Value: { Ref: 'HttpApi' }
    };
    template.Outputs[OUTPUT_KEYS.apiEndpoint] = {
      Description: 'Invoke URL of the HTTP API stage',
      Value: { 'Fn::Sub': `https://\${HttpApi}.execute-api.\${AWS::Region}.\${AWS::URLSuffix}/${backend.stage}` }
    };
  }

  private functionEnvironment(backend: NormalizedBackend): Record<string, TemplateValue> {
    const variables: Record<string, TemplateValue> = {
      ...(backend.environment ?? {}),
      // Requests arrive prefixed with the stage name
      AWS_LWA_REMOVE_BASE_PATH: `/${backend.stage}`
    };
    if (backend.database_configuration) {
      variables.TABLE_NAME = { Ref: 'DataTable' };
    }
    return { ...variables, ...webAdapterEnvironment(backend.port) };
  }

  private createTable(database: DatabaseConfiguration, spec: NormalizedDeploymentSpec): TemplateResource {
    const billingMode = database.billing_mode ?? 'PAY_PER_REQUEST';
    const properties: Record<string, TemplateValue> = {
      TableName: database.table_name,
      AttributeDefinitions: database.attribute_definitions.map(attribute => ({
        AttributeName: attribute.name,
        AttributeType: attribute.type
      })),
      KeySchema: database.key_schema.map(key => ({
        AttributeName: key.name,
        KeyType: key.type
      })),
      BillingMode: billingMode,
      Tags: this.createTags(spec)
    };

    if (billingMode === 'PROVISIONED') {
      properties.ProvisionedThroughput = {
        ReadCapacityUnits: database.read_capacity ?? 5,
        WriteCapacityUnits: database.write_capacity ?? 5
      };
    }

    return { Type: 'AWS::DynamoDB::Table', Properties: properties };
  }

  private tableAccessPolicy(): TemplateValue {
    return {
      PolicyName: 'DataTableCrud',
      PolicyDocument: {
        Version: '2012-10-17',
        Statement: [
          {
            Effect: 'Allow',
            Action: [
              'dynamodb:GetItem',
              'dynamodb:PutItem',
              'dynamodb:UpdateItem',
              'dynamodb:DeleteItem',
              'dynamodb:Query',
              'dynamodb:Scan',
              'dynamodb:BatchGetItem',
              'dynamodb:BatchWriteItem',
              'dynamodb:ConditionCheckItem',
              'dynamodb:DescribeTable'
            ],
            Resource: [
              { 'Fn::GetAtt': ['DataTable', 'Arn'] },
              { 'Fn::Sub': '${DataTable.Arn}/index/*' }
            ]
          }
        ]
      }
    };
  }

  private addFrontendResources(
    template: CloudFormationTemplate,
    spec: NormalizedDeploymentSpec,
    frontend: NormalizedFrontend,
    backend?: NormalizedBackend
  ): void {
    template.Resources.WebsiteBucket = {
      Type: 'AWS::S3::Bucket',
      Properties: {
        PublicAccessBlockConfiguration: {
          BlockPublicAcls: true,
          BlockPublicPolicy: true,
          IgnorePublicAcls: true,
          RestrictPublicBuckets: true
        },
        OwnershipControls: {
          Rules: [{ ObjectOwnership: 'BucketOwnerEnforced' }]
        },
        BucketEncryption: {
          ServerSideEncryptionConfiguration: [
            { ServerSideEncryptionByDefault: { SSEAlgorithm: 'AES256' } }
          ]
        },
        Tags: this.createTags(spec)
      }
    };

    template.Resources.WebsiteOriginAccessControl = {
      Type: 'AWS::CloudFront::OriginAccessControl',
      Properties: {
        OriginAccessControlConfig: {
          Name: { 'Fn::Sub': '${AWS::StackName}-oac' },
          OriginAccessControlOriginType: 's3',
          SigningBehavior: 'always',
          SigningProtocol: 'sigv4'
        }
      }
    };

    template.Resources.WebsiteBucketPolicy = {
      Type: 'AWS::S3::BucketPolicy',
      Properties: {
        Bucket: { Ref: 'WebsiteBucket' },
        PolicyDocument: {
          Version: '2012-10-17',
          Statement: [
            {
              Sid: 'AllowCloudFrontRead',
              Effect: 'Allow',
              Principal: { Service: 'cloudfront.amazonaws.com' },
              Action: 's3:GetObject',
              Resource: { 'Fn::Sub': '${WebsiteBucket.Arn}/*' },
              Condition: {
                StringEquals: {
                  'AWS:SourceArn': { 'Fn::Sub': 'arn:${AWS::Partition}:cloudfront::${AWS::AccountId}:distribution/${Distribution}' }
                }
              }
            }
          ]
        }
      }
    };

    const origins: TemplateValue[] = [
      {
        Id: 'S3Origin',
        DomainName: { 'Fn::GetAtt': ['WebsiteBucket', 'RegionalDomainName'] },
        S3OriginConfig: { OriginAccessIdentity: '' },
        OriginAccessControlId: { 'Fn::GetAtt': ['WebsiteOriginAccessControl', 'Id'] }
      }
    ];
    const distributionConfig: Record<string, TemplateValue> = {
      Enabled: true,
      Comment: `${spec.project_name} web distribution`,
      DefaultRootObject: frontend.index_document,
      HttpVersion: 'http2',
      PriceClass: 'PriceClass_100',
      Origins: origins,
      DefaultCacheBehavior: {
        TargetOriginId: 'S3Origin',
        ViewerProtocolPolicy: 'redirect-to-https',
        AllowedMethods: ['GET', 'HEAD', 'OPTIONS'],
        CachedMethods: ['GET', 'HEAD'],
        CachePolicyId: CACHING_OPTIMIZED_POLICY_ID,
        Compress: true
      },
      ViewerCertificate: { CloudFrontDefaultCertificate: true }
    };

    if (backend) {
      origins.push({
        Id: 'ApiOrigin',
        DomainName: { 'Fn::Sub': '${HttpApi}.execute-api.${AWS::Region}.${AWS::URLSuffix}' },
        OriginPath: `/${backend.stage}`,
        CustomOriginConfig: {
          OriginProtocolPolicy: 'https-only',
          OriginSSLProtocols: ['TLSv1.2']
        }
      });
      distributionConfig.CacheBehaviors = [
        {
          PathPattern: '/api/*',
          TargetOriginId: 'ApiOrigin',
          ViewerProtocolPolicy: 'redirect-to-https',
          AllowedMethods: ['GET', 'HEAD', 'OPTIONS', 'PUT', 'POST', 'PATCH', 'DELETE'],
          CachedMethods: ['GET', 'HEAD'],
          CachePolicyId: CACHING_DISABLED_POLICY_ID,
          OriginRequestPolicyId: ALL_VIEWER_EXCEPT_HOST_HEADER_POLICY_ID,
          Compress: true
        }
      ];
    } else {
      // Error responses are distribution-wide and would mask API errors
      distributionConfig.CustomErrorResponses = this.errorResponses(frontend);
    }

    if (frontend.custom_domain && frontend.certificate_arn) {
      distributionConfig.Aliases = [frontend.custom_domain];
      distributionConfig.ViewerCertificate = {
        AcmCertificateArn: frontend.certificate_arn,
        SslSupportMethod: 'sni-only',
        MinimumProtocolVersion: 'TLSv1.2_2021'
      };
    }

    template.Resources.Distribution = {
      Type: 'AWS::CloudFront::Distribution',
      Properties: {
        DistributionConfig: distributionConfig,
        Tags: this.createTags(spec)
      }
    };

    template.Outputs[OUTPUT_KEYS.bucketName] = {
      Description: 'Bucket holding the website assets',
      Value: { Ref: 'WebsiteBucket' }
    };
    template.Outputs[OUTPUT_KEYS.distributionId] = {
      Description: 'CloudFront distribution id',
      Value: { Ref: 'Distribution' }
    };
    template.Outputs[OUTPUT_KEYS.distributionDomain] = {
      Description: 'CloudFront distribution domain name',
      Value: { 'Fn::GetAtt': ['Distribution', 'DomainName'] }
    };
    template.Outputs[OUTPUT_KEYS.websiteUrl] = {
      Description: 'Public URL of the website',
      Value: frontend.custom_domain && frontend.certificate_arn
        ? `https://${frontend.custom_domain}`
        : { 'Fn::Sub': 'https://${Distribution.DomainName}' }
    };
  }

  /**
   * Single-page apps get their index for unknown paths; a configured error
   * document is served with a 404 instead.
   */
  private errorResponses(frontend: NormalizedFrontend): TemplateValue[] {
    const pagePath = `/${frontend.error_document ?? frontend.index_document}`;
    const responseCode = frontend.error_document ? 404 : 200;
    return [403, 404].map(errorCode => ({
      ErrorCode: errorCode,
      ResponseCode: responseCode,
      ResponsePagePath: pagePath,
      ErrorCachingMinTTL: 0
    }));
  }

  private createTags(spec: NormalizedDeploymentSpec): TemplateValue[] {
    return [
      { Key: 'webapp-deployer:project', Value: spec.project_name },
      { Key: 'webapp-deployer:type', Value: spec.deployment_type },
      { Key: 'ManagedBy', Value: 'webapp-deployer' }
    ];
  }
}
