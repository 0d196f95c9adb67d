import { CommitRangeResolver } from '../../resolver/resolver.js';
import { RunContext } from '../../pipeline/context.js';
import { formatIssues, formatRange } from '../formatters/terminal.js';
import { formatRangeJson } from '../formatters/json.js';
import { type RangeOptions, buildScope, openSession } from './common.js';

export interface ResolveOptions extends RangeOptions {
  format?: 'terminal' | 'json';
}

/** Print the commits a `generate` run would cover, without rendering anything. */
export async function resolveCommand(opts: ResolveOptions = {}): Promise<void> {
  const session = await openSession(opts);
  const scope = await buildScope(opts, session);

  const ctx = new RunContext();
  const range = await new CommitRangeResolver(session.git).resolve(scope, ctx);

  if (opts.format === 'json') {
    console.log(formatRangeJson(range));
  } else {
    console.log(formatRange(range));
  }

  const issues = formatIssues(ctx.getIssues());
  if (issues) console.error(`\n${issues}`);
}
