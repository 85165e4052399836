/**
 * Contract deployment and lookup of deployed contracts from build artifacts
 */

import type { Address, Hash, Hex, TransactionReceipt } from '../core/types.js';
import { ArgumentMismatchError, EthBindError, ValidationError } from '../core/errors.js';
import { computeContractAddress, isAddress, toChecksumAddress } from '../core/address.js';
import { concatHex } from '../core/hex.js';
import type { Logger } from '../core/logger.js';
import { createPrefixedLogger, noopLogger } from '../core/logger.js';
import type { ContractDescriptor } from '../abi/descriptor.js';
import { parseContractDescriptor } from '../abi/descriptor.js';
import type { DescriptorCache } from '../abi/descriptor-cache.js';
import type { BindingOptions } from '../abi/binding.js';
import type { Bytecode } from '../abi/bytecode.js';
import { Linker } from '../abi/bytecode.js';
import { encodeParameters } from '../abi/codec.js';
import { toAbiValues } from '../abi/native.js';
import type { NodeClient } from './rpc.js';
import type { Account } from './account.js';
import type { GasEstimator } from './gas.js';
import type { PendingTransaction, SendOptions } from './pipeline.js';
import { TransactionPipeline } from './pipeline.js';
import { TransactionRequest } from './transaction.js';
import { ContractInstance } from './contract.js';

/** A deployed library address, or bytecode to deploy it from */
export type LibrarySource = Address | { readonly bytecode: string | Bytecode };

export interface DeployConfig {
  descriptor: ContractDescriptor;
  bytecode: string | Bytecode;
  /** Constructor arguments */
  args?: ReadonlyArray<unknown>;
  /** Library name to address or bytecode */
  libraries?: Readonly<Record<string, LibrarySource>>;
  client: NodeClient;
  account?: Account;
  pipeline?: TransactionPipeline;
  gasEstimator?: GasEstimator;
  aliases?: BindingOptions['aliases'];
  logger?: Logger;
}

export interface DeploymentResult {
  readonly contract: ContractInstance;
  readonly receipt: TransactionReceipt;
  /** Addresses of the libraries deployed for this contract */
  readonly libraries: Readonly<Record<string, Address>>;
}

/**
 * Creation payload: bytecode followed by the encoded constructor arguments.
 * Arguments for a contract without a constructor are rejected.
 */
export function encodeDeployData(descriptor: ContractDescriptor, bytecode: Hex, args: ReadonlyArray<unknown> = []): Hex {
  const ctor = descriptor.deploy;
  if (ctor === undefined) {
    if (args.length > 0) {
      throw new ArgumentMismatchError(`contract has no constructor but ${args.length} arguments were given`, {
        received: args.length,
      });
    }
    return bytecode;
  }
  const values = toAbiValues(ctor.inputs, args, 'constructor');
  return concatHex(
    bytecode,
    encodeParameters(
      ctor.inputs.map((p) => p.type),
      values
    )
  );
}

/**
 * Address a creation transaction from `from` lands at, given its nonce
 */
export function predictDeploymentAddress(transaction: PendingTransaction, from: Address): Address {
  const { nonce } = transaction.signed.transaction;
  if (nonce === undefined) {
    throw new ValidationError('Signed transaction has no nonce');
  }
  return computeContractAddress(from, nonce);
}

function createdAddress(receipt: TransactionReceipt, predicted: Address): Address {
  if (receipt.contractAddress !== undefined && receipt.contractAddress.toLowerCase() !== predicted.toLowerCase()) {
    throw new EthBindError({
      code: 'DEPLOYMENT_MISMATCH',
      message: `Contract created at ${receipt.contractAddress}, expected ${predicted}`,
      details: { contractAddress: receipt.contractAddress, predicted },
      suggestion: 'Check the node reports receipts for this chain correctly',
      retryable: false,
    });
  }
  return receipt.contractAddress ?? predicted;
}

/**
 * Options for library deployments: fees and pipeline settings carry over,
 * value, nonce and gas limit belong to the contract transaction only
 */
function libraryOptions(options: SendOptions): SendOptions {
  const shared: SendOptions = { ...options };
  delete shared.value;
  delete shared.nonce;
  delete shared.gasLimit;
  return shared;
}

/**
 * Deploy a contract, first deploying every library given as bytecode.
 * Resolves once the creation transaction is confirmed.
 *
 * ```typescript
 * const { contract } = await deployContract({
 *   descriptor, bytecode, args: [1000n], libraries: { Math: mathAddress }, client, account,
 * });
 * ```
 */
export async function deployContract(config: DeployConfig, options: SendOptions = {}): Promise<DeploymentResult> {
  const logger = createPrefixedLogger(config.logger ?? noopLogger, 'deploy');
  const pipeline = config.pipeline ?? pipelineFor(config);
  const from = pipeline.account.address;

  if (options.value !== undefined && options.value > 0n && config.descriptor.deploy?.payable !== true) {
    throw new ArgumentMismatchError('constructor is not payable', { value: options.value.toString() });
  }

  const linker = new Linker(config.bytecode);
  for (const [name, source] of Object.entries(config.libraries ?? {})) {
    if (typeof source === 'string') {
      if (!isAddress(source)) {
        throw new ValidationError(`Invalid address for library ${name}: ${source}`);
      }
      linker.libraryAt(name, source);
    } else {
      linker.deployLibrary(name, source.bytecode);
    }
  }
  const linked = linker.link();
  if (linked.libraries.length > 0 && options.nonce !== undefined) {
    throw new ValidationError('A fixed nonce cannot be used when libraries are deployed first');
  }
  // Validate constructor arguments before any library is deployed
  encodeDeployData(config.descriptor, '0x', config.args);

  let bytecode = linked.contract;
  const libraries: Record<string, Address> = {};
  for (const library of linked.libraries) {
    const pending = await pipeline.submit(new TransactionRequest({ data: library.bytecode }), libraryOptions(options));
    const predicted = predictDeploymentAddress(pending, from);
    logger.info('Deploying library', { library: library.name, hash: pending.hash, predicted });
    const receipt = await pending.wait();
    const address = createdAddress(receipt, predicted);
    libraries[library.name] = address;
    bytecode = bytecode.link(library.name, address);
  }

  const data = encodeDeployData(config.descriptor, bytecode.toHex(), config.args);
  const pending = await pipeline.submit(new TransactionRequest({ data }), options, config.descriptor);
  const predicted = predictDeploymentAddress(pending, from);
  logger.info('Deploying contract', { hash: pending.hash, predicted });
  const receipt = await pending.wait();
  const address = createdAddress(receipt, predicted);
  logger.info('Contract deployed', { address, blockNumber: receipt.blockNumber });

  const contract = new ContractInstance({
    descriptor: config.descriptor,
    address,
    client: config.client,
    pipeline,
    ...(config.aliases ? { aliases: config.aliases } : {}),
    ...(config.logger ? { logger: config.logger } : {}),
  });
  return { contract, receipt, libraries };
}

function pipelineFor(config: DeployConfig): TransactionPipeline {
  if (!config.account) {
    throw new ValidationError('An account or pipeline is required to deploy');
  }
  return new TransactionPipeline({
    client: config.client,
    account: config.account,
    ...(config.gasEstimator ? { gasEstimator: config.gasEstimator } : {}),
    ...(config.logger ? { logger: config.logger } : {}),
  });
}

// ============ Artifacts ============

export interface ArtifactNetwork {
  readonly address: Address;
  readonly transactionHash?: Hash;
}

/**
 * Compiler/framework build output: ABI, creation bytecode and known deployments
 * keyed by chain id
 */
export interface ContractArtifact {
  readonly contractName: string;
  readonly abi: unknown;
  readonly bytecode?: string;
  readonly networks?: Readonly<Record<string, ArtifactNetwork>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed artifact JSON document
 */
export function readArtifact(input: unknown): ContractArtifact {
  let value = input;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch (error) {
      throw new ValidationError(`Artifact is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  if (!isRecord(value)) {
    throw new ValidationError('Artifact must be a JSON object');
  }
  const { contractName, abi, bytecode, networks } = value;
  if (!Array.isArray(abi)) {
    throw new ValidationError('Artifact has no abi array');
  }
  const artifact: { -readonly [K in keyof ContractArtifact]: ContractArtifact[K] } = {
    contractName: typeof contractName === 'string' ? contractName : 'Contract',
    abi,
  };
  if (typeof bytecode === 'string' && bytecode !== '' && bytecode !== '0x') {
    artifact.bytecode = bytecode;
  }
  if (isRecord(networks)) {
    const parsed: Record<string, ArtifactNetwork> = {};
    for (const [chainId, network] of Object.entries(networks)) {
      const address = isRecord(network) ? network['address'] : undefined;
      if (!isRecord(network) || !isAddress(address)) {
        throw new ValidationError(`Artifact network ${chainId} has no valid address`);
      }
      const hash = network['transactionHash'];
      parsed[chainId] =
        typeof hash === 'string' && /^0x[0-9a-fA-F]{64}$/.test(hash)
          ? { address, transactionHash: hash.toLowerCase() as Hash }
          : { address };
    }
    artifact.networks = parsed;
  }
  return artifact;
}

export interface DeployedContractOptions {
  /** Chain id to address; takes precedence over the artifact's networks */
  deployments?: Readonly<Record<string, Address>>;
  account?: Account;
  cache?: DescriptorCache;
  aliases?: BindingOptions['aliases'];
  logger?: Logger;
}

/**
 * Instance of `artifact` at its address on the client's chain
 */
export async function deployedContract(
  artifact: ContractArtifact,
  client: NodeClient,
  options: DeployedContractOptions = {}
): Promise<ContractInstance> {
  const chainId = String(await client.getChainId());
  const address = options.deployments?.[chainId] ?? artifact.networks?.[chainId]?.address;
  if (address === undefined) {
    throw new ValidationError(`${artifact.contractName} is not deployed on chain ${chainId}`, { chainId });
  }
  const descriptor = options.cache ? options.cache.get(artifact.abi) : parseContractDescriptor(artifact.abi);
  return new ContractInstance({
    descriptor,
    address: toChecksumAddress(address),
    client,
    ...(options.account ? { account: options.account } : {}),
    ...(options.aliases ? { aliases: options.aliases } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
  });
}

/**
 * Deploy `artifact`'s bytecode
 */
export async function deployArtifact(
  artifact: ContractArtifact,
  config: Omit<DeployConfig, 'descriptor' | 'bytecode'> & { cache?: DescriptorCache },
  options: SendOptions = {}
): Promise<DeploymentResult> {
  if (artifact.bytecode === undefined) {
    throw new ValidationError(`${artifact.contractName} has no bytecode; it may be abstract or an interface`);
  }
  const { cache, ...rest } = config;
  const descriptor = cache ? cache.get(artifact.abi) : parseContractDescriptor(artifact.abi);
  return deployContract({ ...rest, descriptor, bytecode: artifact.bytecode }, options);
}
