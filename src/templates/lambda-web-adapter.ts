import { LambdaArchitecture } from '../types';
import { TemplateValue } from './types';

export const WEB_ADAPTER_LAYER_ACCOUNT = '753240598075';
export const WEB_ADAPTER_LAYER_VERSION = 25;

export interface WebAdapterOptions {
  port: number;
  memorySize: number;
  timeout: number;
  runtime: string;
  architecture: LambdaArchitecture;
}

export function webAdapterLayerArn(architecture: LambdaArchitecture): TemplateValue {
  const layerName = architecture === 'arm64' ? 'LambdaAdapterLayerArm64' : 'LambdaAdapterLayerX86';
  return {
    'Fn::Sub': `arn:aws:lambda:\${AWS::Region}:${WEB_ADAPTER_LAYER_ACCOUNT}:layer:${layerName}:${WEB_ADAPTER_LAYER_VERSION}`
  };
}

export function webAdapterEnvironment(port: number): Record<string, string> {
  return {
    AWS_LAMBDA_EXEC_WRAPPER: '/opt/bootstrap',
    PORT: String(port),
    AWS_LWA_PORT: String(port)
  };
}

/**
 * Function properties that let an unmodified web server run behind the
 * Lambda Web Adapter. The caller adds code, role, handler and any extra
 * environment on top.
 */
export function webAdapterFunctionProperties(options: WebAdapterOptions): Record<string, TemplateValue> {
  return {
    Runtime: options.runtime,
    MemorySize: options.memorySize,
    Timeout: options.timeout,
    Architectures: [options.architecture],
    Layers: [webAdapterLayerArn(options.architecture)],
    Environment: {
      Variables: webAdapterEnvironment(options.port)
    }
  };
}
