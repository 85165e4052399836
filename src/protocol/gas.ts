/**
 * Gas estimation and fee selection
 */

import type { TransactionType } from '../core/types.js';
import { ContractRevertError, GasEstimationFailedError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { noopLogger } from '../core/logger.js';
import type { ContractDescriptor } from '../abi/descriptor.js';
import { decodeRevertData } from '../abi/revert.js';
import type { CallRequest, NodeClient } from './rpc.js';
import { isExecutionRevert, revertDataOf } from './rpc.js';

export type FeeFields =
  | { readonly type: 'legacy'; readonly gasPrice: bigint }
  | { readonly type: 'eip1559'; readonly maxFeePerGas: bigint; readonly maxPriorityFeePerGas: bigint };

/**
 * Estimation stage of the pipeline. Implementations must not retry a
 * node-reported revert.
 */
export interface GasEstimator {
  /** Gas limit for `request`, margin included */
  estimateGas(request: CallRequest, descriptor?: ContractDescriptor): Promise<bigint>;
  /** Fee fields for a transaction of `type`, or of the type the chain prefers */
  getFees(type?: TransactionType): Promise<FeeFields>;
}

export interface GasEstimatorConfig {
  /** Multiplier applied to the node estimate (default: 1.2) */
  gasLimitMultiplier?: number;
  /** Prefer EIP-1559 fees when the chain reports a base fee (default: true) */
  useEIP1559?: boolean;
  /** Upper bound for gasPrice / maxFeePerGas */
  maxGasPrice?: bigint;
  logger?: Logger;
}

/**
 * Estimator backed by eth_estimateGas, eth_gasPrice and the latest block's base fee
 */
export class NodeGasEstimator implements GasEstimator {
  private readonly multiplierPercent: bigint;
  private readonly useEIP1559: boolean;
  private readonly maxGasPrice: bigint | undefined;
  private readonly logger: Logger;
  private chainSupportsEIP1559: boolean | null = null;

  constructor(
    private readonly client: NodeClient,
    config: GasEstimatorConfig = {}
  ) {
    const multiplier = config.gasLimitMultiplier ?? 1.2;
    if (!(multiplier >= 1)) {
      throw new RangeError(`gasLimitMultiplier must be at least 1, got ${multiplier}`);
    }
    this.multiplierPercent = BigInt(Math.round(multiplier * 100));
    this.useEIP1559 = config.useEIP1559 ?? true;
    this.maxGasPrice = config.maxGasPrice;
    this.logger = config.logger ?? noopLogger;
  }

  async estimateGas(request: CallRequest, descriptor?: ContractDescriptor): Promise<bigint> {
    let estimate: bigint;
    try {
      estimate = await this.client.estimateGas(request);
    } catch (error) {
      if (isExecutionRevert(error)) {
        const revert = new ContractRevertError(decodeRevertData(revertDataOf(error), descriptor));
        this.logger.warn('Gas estimation reverted', { to: request.to, reason: revert.reason });
        throw new GasEstimationFailedError(revert.reason, revert);
      }
      throw error;
    }
    // Round up so the margin never shrinks the estimate
    const adjusted = (estimate * this.multiplierPercent + 99n) / 100n;
    this.logger.debug('Gas estimated', { estimate: estimate.toString(), gasLimit: adjusted.toString() });
    return adjusted;
  }

  async getFees(type?: TransactionType): Promise<FeeFields> {
    const wanted = type ?? ((await this.supportsEIP1559()) && this.useEIP1559 ? 'eip1559' : 'legacy');

    if (wanted === 'eip1559') {
      const [block, priority] = await Promise.all([this.client.getBlock('latest'), this.client.getMaxPriorityFeePerGas()]);
      const baseFee = block?.baseFeePerGas ?? 0n;
      // Headroom for two full blocks of base fee increase
      const maxFeePerGas = this.clamp(baseFee * 2n + priority);
      return { type: 'eip1559', maxFeePerGas, maxPriorityFeePerGas: priority < maxFeePerGas ? priority : maxFeePerGas };
    }

    return { type: 'legacy', gasPrice: this.clamp(await this.client.getGasPrice()) };
  }

  private async supportsEIP1559(): Promise<boolean> {
    if (this.chainSupportsEIP1559 === null) {
      const block = await this.client.getBlock('latest');
      this.chainSupportsEIP1559 = block?.baseFeePerGas !== undefined;
    }
    return this.chainSupportsEIP1559;
  }

  private clamp(price: bigint): bigint {
    if (this.maxGasPrice !== undefined && price > this.maxGasPrice) {
      return this.maxGasPrice;
    }
    return price;
  }
}
