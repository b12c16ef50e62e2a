import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { GoodDataClient } from '../adapters/gooddata/gooddata-client';
import { loadProvisionerConfig } from '../config/provisioner-config';
import { ComponentNotFoundError, ComponentTypeMismatchError, DataProduct } from '../services/data-product';
import { RequestUnpacker } from '../services/request-unpacker';
import {
  isValidationError,
  requestValidationError,
  systemErr,
  validationError,
  validationResult
} from '../services/results';
import { schemaValidator } from '../services/schema-validator';
import { WorkspaceProvisioner } from '../services/workspace-provisioner';
import { GoodDataOutputPort } from '../types/descriptor';
import { ProvisionerResponse } from '../types/provisioning';
import { SpecificProvisioner } from '../types/provisioner';

export type ProvisionerFactory = () => Promise<SpecificProvisioner>;

type Handler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

const COMPONENT_TYPE_ERROR = 'Component is not of expected type.';

/**
 * Common CORS headers for all responses
 */
const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS'
};

/**
 * HTTP status for each result kind
 */
const STATUS_CODES: Record<ProvisionerResponse['kind'], number> = {
  ProvisioningStatus: 200,
  ReverseProvisioningStatus: 200,
  ValidationResult: 200,
  ValidationError: 400,
  RequestValidationError: 400,
  SystemErr: 500
};

/**
 * Serializes a result; `kind` tags stay internal
 */
export function resultResponse(result: ProvisionerResponse): APIGatewayProxyResult {
  const { kind, ...body } = result;
  const payload =
    result.kind === 'ValidationResult' && result.error
      ? { ...body, error: { errors: result.error.errors } }
      : body;
  return {
    statusCode: STATUS_CODES[kind],
    headers: CORS_HEADERS,
    body: JSON.stringify(payload)
  };
}

function notFoundResponse(): APIGatewayProxyResult {
  return {
    statusCode: 404,
    headers: CORS_HEADERS,
    body: JSON.stringify({ error: 'Route not found' })
  };
}

/**
 * Parses the JSON request body. Answers undefined for an unparseable body,
 * which then fails request validation.
 */
function parseBody(event: APIGatewayProxyEvent): unknown {
  if (!event.body) {
    return undefined;
  }
  const raw = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
  try {
    return JSON.parse(raw);
  } catch (error) {
    console.warn('Unable to parse request body as JSON:', error);
    return undefined;
  }
}

/**
 * Looks the component up as a GoodData output port; null when it is missing
 * or of another type.
 */
function findOutputPort(dataProduct: DataProduct, componentId: string): GoodDataOutputPort | null {
  try {
    return dataProduct.getTypedComponentById(componentId, 'GOODDATA_OUTPUT_PORT');
  } catch (error) {
    if (error instanceof ComponentNotFoundError || error instanceof ComponentTypeMismatchError) {
      console.warn(error.message);
      return null;
    }
    throw error;
  }
}

/**
 * Builds the Lambda handler around a provisioner factory. The factory is
 * called at most once per container, on the first request that needs it.
 */
export function createHandler(createProvisioner: ProvisionerFactory): Handler {
  let provisioner: Promise<SpecificProvisioner> | undefined;
  const getProvisioner = (): Promise<SpecificProvisioner> => {
    if (!provisioner) {
      provisioner = createProvisioner();
      // A failed construction is retried on the next request
      provisioner.catch(() => {
        provisioner = undefined;
      });
    }
    return provisioner;
  };

  /**
   * POST /v1/validate
   */
  async function validate(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
    const unpacked = RequestUnpacker.unpackProvisioningRequest(parseBody(event));
    if (isValidationError(unpacked)) {
      return resultResponse(validationResult(unpacked));
    }

    const { dataProduct, componentId } = unpacked;
    console.log(`Validating component with id: ${componentId}`);
    const component = findOutputPort(dataProduct, componentId);
    if (!component) {
      return resultResponse(validationResult(validationError([COMPONENT_TYPE_ERROR])));
    }

    return resultResponse(await (await getProvisioner()).validate(component, dataProduct));
  }

  /**
   * POST /v1/provision
   */
  async function provision(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
    const unpacked = RequestUnpacker.unpackProvisioningRequest(parseBody(event));
    if (isValidationError(unpacked)) {
      return resultResponse(unpacked);
    }

    const { dataProduct, componentId } = unpacked;
    console.log(`Provisioning component with id: ${componentId}`);
    const component = findOutputPort(dataProduct, componentId);
    if (!component) {
      return resultResponse(validationError([COMPONENT_TYPE_ERROR]));
    }

    return resultResponse(await (await getProvisioner()).provision(component, dataProduct));
  }

  /**
   * POST /v1/unprovision
   */
  async function unprovision(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
    const unpacked = RequestUnpacker.unpackUnprovisioningRequest(parseBody(event));
    if (isValidationError(unpacked)) {
      return resultResponse(unpacked);
    }

    const { dataProduct, componentId, removeData } = unpacked;
    console.log(`Unprovisioning component with id: ${componentId}`);
    const component = findOutputPort(dataProduct, componentId);
    if (!component) {
      return resultResponse(validationError([COMPONENT_TYPE_ERROR]));
    }

    return resultResponse(await (await getProvisioner()).unprovision(component, dataProduct, removeData));
  }

  /**
   * POST /v1/updateacl
   */
  async function updateAcl(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
    const unpacked = RequestUnpacker.unpackUpdateAclRequest(parseBody(event));
    if (isValidationError(unpacked)) {
      return resultResponse(unpacked);
    }

    const { dataProduct, componentId, refs } = unpacked;
    console.log(`Updating ACL for component with id: ${componentId}`);
    const component = findOutputPort(dataProduct, componentId);
    if (!component) {
      return resultResponse(validationError([COMPONENT_TYPE_ERROR]));
    }

    return resultResponse(await (await getProvisioner()).updateAcl(component, dataProduct, refs));
  }

  /**
   * POST /v1/reverse-provisioning
   */
  async function reverseProvision(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
    const request = schemaValidator.validateReverseProvisioningRequest(parseBody(event));
    if (!request.parsedOutput) {
      return resultResponse(
        requestValidationError(
          `Invalid reverse provisioning request: ${request.errors.join('; ')}`,
          'Invalid reverse provisioning request',
          'Send useCaseTemplateId and environment with the reverse provisioning request'
        )
      );
    }

    const { useCaseTemplateId, environment, params, catalogInfo } = request.parsedOutput;
    return resultResponse(
      await (await getProvisioner()).reverseProvision(useCaseTemplateId, environment, params, catalogInfo)
    );
  }

  /**
   * Main handler that routes requests based on HTTP method and path
   */
  return async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
    // Handle CORS preflight
    if (event.httpMethod === 'OPTIONS') {
      return {
        statusCode: 200,
        headers: CORS_HEADERS,
        body: ''
      };
    }

    const path = event.path;
    const method = event.httpMethod;

    try {
      if (method === 'POST' && path === '/v1/validate') {
        return await validate(event);
      }

      if (method === 'POST' && path === '/v1/provision') {
        return await provision(event);
      }

      if (method === 'POST' && path === '/v1/unprovision') {
        return await unprovision(event);
      }

      if (method === 'POST' && path === '/v1/updateacl') {
        return await updateAcl(event);
      }

      if (method === 'POST' && path === '/v1/reverse-provisioning') {
        return await reverseProvision(event);
      }

      // Provisioning runs synchronously, so there is no status to report
      if (method === 'GET' && path.match(/^\/v1\/provision\/[^/]+\/status$/)) {
        return resultResponse(systemErr('Response not yet implemented'));
      }

      // Asynchronous validation is not offered
      if (
        (method === 'POST' && path === '/v2/validate') ||
        (method === 'GET' && path.match(/^\/v2\/validate\/[^/]+\/status$/))
      ) {
        return resultResponse(systemErr('Response not yet implemented'));
      }

      return notFoundResponse();
    } catch (error) {
      console.error(`Error handling ${method} ${path}:`, error);
      return resultResponse(systemErr(error instanceof Error ? error.message : String(error)));
    }
  };
}

/**
 * Provisioner backed by the GoodData REST API, configured from the environment
 */
export async function createGoodDataProvisioner(): Promise<SpecificProvisioner> {
  const config = await loadProvisionerConfig();
  const client = new GoodDataClient(config.gooddata, config.snowflake);
  return new WorkspaceProvisioner(client, console);
}

export const handler = createHandler(createGoodDataProvisioner);
