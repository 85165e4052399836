import { describe, it, expect, beforeEach } from 'vitest';
import {
  deployArtifact,
  deployContract,
  deployedContract,
  encodeDeployData,
  readArtifact,
} from '../../src/protocol/deploy.js';
import { LocalAccount } from '../../src/protocol/account.js';
import { parseSignedTransaction } from '../../src/protocol/transaction.js';
import { parseContractDescriptor } from '../../src/abi/descriptor.js';
import { encodeParameters } from '../../src/abi/codec.js';
import { uintType } from '../../src/abi/types.js';
import { computeContractAddress } from '../../src/core/address.js';
import { concatHex } from '../../src/core/hex.js';
import { ArgumentMismatchError, ValidationError } from '../../src/core/errors.js';
import { FakeNode } from '../helpers/fake-node.js';
import { TOKEN, erc20Abi } from '../fixtures/erc20.js';

const LEGACY_SLOT = '__Math__________________________________';
const supplyArg = encodeParameters([uintType()], [1000n]);

const tokenAbi = [
  ...erc20Abi,
  {
    type: 'constructor',
    inputs: [{ name: 'supply', type: 'uint256' }],
    stateMutability: 'nonpayable',
  },
] as const;

describe('deployment', () => {
  const descriptor = parseContractDescriptor(tokenAbi);
  const account = LocalAccount.fromPrivateKey('0x' + '11'.repeat(32));
  let node: FakeNode;

  beforeEach(() => {
    node = new FakeNode();
    node.autoMine = true;
  });

  describe('encodeDeployData', () => {
    it('appends the constructor arguments to the bytecode', () => {
      expect(encodeDeployData(descriptor, '0x6080', [1000n])).toBe(concatHex('0x6080', supplyArg));
    });

    it('rejects arguments for a contract without a constructor', () => {
      const plain = parseContractDescriptor(erc20Abi);
      expect(encodeDeployData(plain, '0x6080')).toBe('0x6080');
      expect(() => encodeDeployData(plain, '0x6080', [1n])).toThrow(
        'contract has no constructor but 1 arguments were given'
      );
    });
  });

  describe('deployContract', () => {
    it('creates the contract and binds it at the created address', async () => {
      const { contract, receipt, libraries } = await deployContract(
        { descriptor, bytecode: '0x6080', args: [1000n], client: node, account },
        { pollInterval: 5 }
      );

      const expected = computeContractAddress(account.address, 0);
      expect(contract.address).toBe(expected);
      expect(receipt.contractAddress).toBe(expected);
      expect(libraries).toEqual({});

      const { transaction } = parseSignedTransaction(node.sent[0] ?? '0x');
      expect(transaction.to).toBeUndefined();
      expect(transaction.data).toBe(concatHex('0x6080', supplyArg));
    });

    it('deploys libraries first and links their addresses', async () => {
      const { contract, libraries } = await deployContract(
        {
          descriptor,
          bytecode: `0x60${LEGACY_SLOT}`,
          args: [1000n],
          libraries: { Math: { bytecode: '0x6001' } },
          client: node,
          account,
        },
        { pollInterval: 5 }
      );

      const math = computeContractAddress(account.address, 0);
      expect(libraries).toEqual({ Math: math });
      expect(contract.address).toBe(computeContractAddress(account.address, 1));

      const [library, created] = node.sent.map((raw) => parseSignedTransaction(raw).transaction);
      expect(library?.data).toBe('0x6001');
      expect(created?.data).toBe(concatHex(`0x60${math.slice(2).toLowerCase()}`, supplyArg));
    });

    it('links libraries that are already deployed', async () => {
      await deployContract(
        { descriptor, bytecode: `0x60${LEGACY_SLOT}`, args: [1000n], libraries: { Math: TOKEN }, client: node, account },
        { pollInterval: 5 }
      );
      expect(node.sent).toHaveLength(1);
      const { transaction } = parseSignedTransaction(node.sent[0] ?? '0x');
      expect(transaction.data).toBe(concatHex(`0x60${TOKEN.slice(2).toLowerCase()}`, supplyArg));
    });

    it('validates constructor arguments before sending anything', async () => {
      await expect(
        deployContract({
          descriptor,
          bytecode: `0x60${LEGACY_SLOT}`,
          args: ['many'],
          libraries: { Math: { bytecode: '0x6001' } },
          client: node,
          account,
        })
      ).rejects.toThrow(ArgumentMismatchError);
      expect(node.sent).toHaveLength(0);
    });

    it('refuses value for a non-payable constructor', async () => {
      await expect(
        deployContract({ descriptor, bytecode: '0x6080', args: [1n], client: node, account }, { value: 1n })
      ).rejects.toThrow('constructor is not payable');
    });

    it('refuses a fixed nonce when libraries are deployed first', async () => {
      await expect(
        deployContract(
          {
            descriptor,
            bytecode: `0x60${LEGACY_SLOT}`,
            args: [1n],
            libraries: { Math: { bytecode: '0x6001' } },
            client: node,
            account,
          },
          { nonce: 4 }
        )
      ).rejects.toThrow('A fixed nonce cannot be used when libraries are deployed first');
    });

    it('needs an account', async () => {
      await expect(deployContract({ descriptor, bytecode: '0x6080', args: [1n], client: node })).rejects.toThrow(
        'An account or pipeline is required to deploy'
      );
    });
  });

  describe('artifacts', () => {
    const artifactJson = JSON.stringify({
      contractName: 'Token',
      abi: tokenAbi,
      bytecode: '0x6080',
      networks: { '1337': { address: TOKEN.toLowerCase(), transactionHash: `0x${'AB'.repeat(32)}` } },
    });

    it('reads an artifact document', () => {
      const artifact = readArtifact(artifactJson);
      expect(artifact.contractName).toBe('Token');
      expect(artifact.bytecode).toBe('0x6080');
      expect(artifact.networks?.['1337']).toEqual({
        address: TOKEN.toLowerCase(),
        transactionHash: `0x${'ab'.repeat(32)}`,
      });
    });

    it('rejects malformed artifacts', () => {
      expect(() => readArtifact('[]')).toThrow('Artifact must be a JSON object');
      expect(() => readArtifact('{"abi": [')).toThrow(ValidationError);
      expect(() => readArtifact('{"abi": [')).toThrow(/^Artifact is not valid JSON: /);
      expect(() => readArtifact({ contractName: 'X' })).toThrow('Artifact has no abi array');
      expect(() => readArtifact({ abi: [], networks: { '1': { address: 'nope' } } })).toThrow(
        'Artifact network 1 has no valid address'
      );
    });

    it('drops empty bytecode', () => {
      expect(readArtifact({ contractName: 'IToken', abi: [], bytecode: '0x' }).bytecode).toBeUndefined();
    });

    it('binds the deployment on the client chain', async () => {
      const contract = await deployedContract(readArtifact(artifactJson), node);
      expect(contract.address).toBe(TOKEN);
      expect(contract.descriptor.deploy?.inputs).toHaveLength(1);
    });

    it('prefers explicit deployments and reports missing ones', async () => {
      const artifact = readArtifact(artifactJson);
      node.chainId = 5;
      await expect(deployedContract(artifact, node)).rejects.toThrow('Token is not deployed on chain 5');
      const contract = await deployedContract(artifact, node, { deployments: { '5': TOKEN } });
      expect(contract.address).toBe(TOKEN);
    });

    it('deploys artifact bytecode', async () => {
      const { contract } = await deployArtifact(readArtifact(artifactJson), { args: [1000n], client: node, account }, { pollInterval: 5 });
      expect(contract.address).toBe(computeContractAddress(account.address, 0));
    });

    it('refuses artifacts without bytecode', async () => {
      const iface = readArtifact({ contractName: 'IToken', abi: [] });
      await expect(deployArtifact(iface, { client: node, account })).rejects.toThrow(
        'IToken has no bytecode; it may be abstract or an interface'
      );
      expect(node.sent).toHaveLength(0);
    });
  });
});
