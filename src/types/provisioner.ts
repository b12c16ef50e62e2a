/**
 * Specific Provisioner interface.
 * The lifecycle operations the API handlers call for one component.
 */

import { GoodDataOutputPort } from './descriptor';
import {
  ProvisioningResult,
  ReverseProvisioningResult,
  ValidationOutcome
} from './provisioning';
import type { DataProduct } from '../services/data-product';

export interface SpecificProvisioner {
  validate(component: GoodDataOutputPort, dataProduct: DataProduct): Promise<ValidationOutcome>;

  provision(component: GoodDataOutputPort, dataProduct: DataProduct): Promise<ProvisioningResult>;

  unprovision(
    component: GoodDataOutputPort,
    dataProduct: DataProduct,
    removeData: boolean
  ): Promise<ProvisioningResult>;

  updateAcl(
    component: GoodDataOutputPort,
    dataProduct: DataProduct,
    refs: string[]
  ): Promise<ProvisioningResult>;

  reverseProvision(
    useCaseTemplateId: string,
    environment: string,
    parameters: Record<string, unknown> | null | undefined,
    catalogInfo: Record<string, unknown> | null | undefined
  ): Promise<ReverseProvisioningResult>;
}
