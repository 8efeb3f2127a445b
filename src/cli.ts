#!/usr/bin/env node
import * as fs from "fs";
import * as readline from "readline";
import { compileSource, tryCompile } from "./compile.js";
import { Interpreter } from "./runtime.js";
import { FrameContext } from "./frame.js";
import { consoleHost, installHostBindings } from "./natives.js";
import { isScriptError } from "./errors.js";
import { show } from "./values.js";
import { type CliConfig, UsageError, parseArgs } from "./config.js";

const USAGE = `usage: cuescript [file] [--event NAME] [--frames N] [--dt SECONDS] [--width W] [--height H] [--quiet]

  file      script registered as event NAME (default "render") and triggered once per frame
  (none)    interactive prompt; a line ending in ':' opens a block, an empty line closes it`;

/* --- argv --- */
function loadConfig(): CliConfig {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(e.message);
    process.exit(2);
  }
}

const config = loadConfig();

/* --- file mode --- */
function runFile(interp: Interpreter, filePath: string): boolean {
  const compiled = tryCompile(fs.readFileSync(filePath, "utf8"));
  if (compiled.t === "err") { console.error(compiled.error.message); return false; }
  interp.registerEvent(config.event, compiled.v);

  const ctx = new FrameContext(interp, config.viewport);
  ctx.init();
  for (let f = 0; f < config.frames; f++) {
    ctx.tick(config.dt);
    const r = interp.triggerEvent(config.event);
    if (r.t === "err") { console.error(`frame ${ctx.frameCount}: ${r.error.message}`); return false; }
  }
  return true;
}

/* --- REPL --- */
function evalChunk(interp: Interpreter, src: string) {
  try {
    const program = compileSource(src);
    const [only] = program.body;
    // A lone expression echoes its value.
    if (program.body.length === 1 && only.k === "ExprS") console.log(show(interp.eval(only.e, interp.globals)));
    else interp.run(program);
  } catch (e) {
    if (!isScriptError(e)) throw e;
    console.error(e.message);
  }
}

async function repl(interp: Interpreter) {
  new FrameContext(interp, config.viewport).init();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "cue> " });
  let buf = "";
  rl.prompt();
  for await (const line of rl) {
    if (buf) {
      if (line.trim() === "") { evalChunk(interp, buf); buf = ""; }
      else buf += line + "\n";
    } else if (line.trimEnd().endsWith(":")) {
      buf = line + "\n";
    } else if (line.trim() !== "") {
      evalChunk(interp, line);
    }
    rl.setPrompt(buf ? "...> " : "cue> ");
    rl.prompt();
  }
}

/* --- start --- */
if (config.help) {
  console.log(USAGE);
  process.exit(0);
}

const interp = new Interpreter();
installHostBindings(interp, consoleHost({ quiet: config.quiet }));

if (config.file) process.exitCode = runFile(interp, config.file) ? 0 : 1;
else await repl(interp);
