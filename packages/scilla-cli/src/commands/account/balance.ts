import { parsePubkey } from '@marinade.finance/web3js-1x'
import { fetchBalance, formatToSol } from '@scilla/sdk'

import { printData } from '../../format'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { PublicKey } from '@solana/web3.js'
import type { Command } from 'commander'

export function configureBalance(program: Command): Command {
  return program
    .command('balance')
    .description('Show the SOL balance of an account')
    .argument('[address]', 'Account address (default: wallet pubkey)', parsePubkey)
}

export function installBalance(program: Command, resolveContext: ContextResolver) {
  configureBalance(program).action(
    async (
      address: Promise<PublicKey> | undefined,
      _options: unknown,
      command: Command,
    ) => {
      await showBalance(await resolveContext(command), {
        address: await address,
      })
    },
  )
}

export async function showBalance(
  context: ScillaCliContext,
  { address }: { address?: PublicKey },
): Promise<{ address: PublicKey; balance: string }> {
  const account = address ?? (await context.getWallet()).publicKey
  const lamports = await fetchBalance({
    connection: context.connection,
    address: account,
    commitment: context.commitment,
  })
  const view = { address: account, balance: `${formatToSol(lamports)} SOL` }
  printData(view, context.format)
  return view
}
