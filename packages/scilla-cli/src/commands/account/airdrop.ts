import { formatToSol, requestAirdrop, solToLamports } from '@scilla/sdk'

import { parseSolAmount } from '../../parsers'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type BN from 'bn.js'
import type { Command } from 'commander'

export function configureAirdrop(program: Command): Command {
  return program
    .command('airdrop')
    .description('Request SOL from the cluster faucet (devnet, testnet, localhost)')
    .argument('[amount]', 'Amount of SOL to request (default: 1)', parseSolAmount)
}

export function installAirdrop(program: Command, resolveContext: ContextResolver) {
  configureAirdrop(program).action(
    async (amount: BN | undefined, _options: unknown, command: Command) => {
      await manageAirdrop(await resolveContext(command), { amount })
    },
  )
}

export async function manageAirdrop(
  context: ScillaCliContext,
  { amount }: { amount?: BN },
): Promise<string> {
  const { publicKey } = await context.getWallet()
  const lamports = amount ?? solToLamports(1)
  context.logger.info(
    `Requesting airdrop of ${formatToSol(lamports)} SOL to ${publicKey.toBase58()}`,
  )
  const signature = await requestAirdrop({
    connection: context.connection,
    address: publicKey,
    lamports,
    finality: context.confirmationFinality,
    logger: context.logger,
  })
  context.logger.info(`Airdrop requested successfully, signature: ${signature}`)
  return signature
}
