
import { DateTime } from 'luxon';
import type { CmdCtx } from '../cmd-ctx';
import { cmdArgs } from '../util/cmd-args';
import { sunMode } from '../../lib/solar/sun-mode';
import { dtUtil } from '../../lib/util/dt-util';

/*
  print dark or light for now (or --at)
_*/
export function modeCmdMain(ctx: CmdCtx, args: string[]) {
  let sunQuery = cmdArgs.getSunQuery(cmdArgs.parseFlags(args));
  let at = sunQuery.at ?? DateTime.now().setZone(dtUtil.resolveZone(sunQuery.timeZone));
  let appearance = sunMode.getAppearance(sunQuery.coord.latitude, sunQuery.coord.longitude, at);
  ctx.logger.info({
    cmd: 'mode',
    coord: sunQuery.coord,
    at: dtUtil.tzIso(at),
  }, appearance);
  ctx.write(`${appearance}\n`);
}
