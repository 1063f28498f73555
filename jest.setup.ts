/**
 * Replaces Jest's console with Node's own, so log lines print without the
 * "console.log / at file.ts:123" framing Jest adds to every call.
 */
import nodeConsole from 'console';

global.console = nodeConsole;
