import { parsePubkey } from '@marinade.finance/web3js-1x'
import { fetchVoteAccount, formatToSol } from '@scilla/sdk'

import { printData } from '../format'

import type { ContextResolver, ScillaCliContext } from '../context'
import type { VoteAccountData } from '@scilla/sdk'
import type { PublicKey } from '@solana/web3.js'
import type { Command } from 'commander'

export function installVoteCommands(
  program: Command,
  resolveContext: ContextResolver,
) {
  program
    .command('vote')
    .description('Validator vote accounts')
    .command('show')
    .description('Show a validator vote account')
    .argument('<vote-account>', 'Vote account address', parsePubkey)
    .action(
      async (address: Promise<PublicKey>, _options: unknown, command: Command) => {
        await showVoteAccount(await resolveContext(command), {
          address: await address,
        })
      },
    )
}

export async function showVoteAccount(
  context: ScillaCliContext,
  { address }: { address: PublicKey },
): Promise<VoteAccountData> {
  const voteAccount = await fetchVoteAccount({
    connection: context.connection,
    address,
    commitment: context.commitment,
    logger: context.logger,
  })
  printData(
    {
      address: voteAccount.address,
      balance: `${formatToSol(voteAccount.lamports)} SOL`,
      validatorIdentity: voteAccount.nodePubkey,
      authorizedWithdrawer: voteAccount.authorizedWithdrawer,
      commission: `${voteAccount.commission}%`,
      rootSlot: voteAccount.rootSlot ?? '~',
      epochCredits: voteAccount.epochCredits.map(({ epoch, credits, prevCredits }) => ({
        epoch,
        credits: credits - prevCredits,
      })),
    },
    context.format,
  )
  return voteAccount
}
