import test from "node:test";
import assert from "node:assert/strict";
import { execFileSync } from "node:child_process";
import { shellJoin, shellQuote } from "../src/utils/shellQuote.js";

function shellEcho(script: string): string {
  return execFileSync("sh", ["-c", script], { encoding: "utf8" });
}

test("shellQuote leaves plain words untouched", () => {
  assert.equal(shellQuote("qchat"), "qchat");
  assert.equal(shellQuote("--trust-all-tools"), "--trust-all-tools");
  assert.equal(shellQuote("path/to/file.ts"), "path/to/file.ts");
});

test("shellQuote renders the empty string as an empty quoted word", () => {
  assert.equal(shellQuote(""), "''");
});

test("shellQuote single-quotes text with spaces and metacharacters", () => {
  assert.equal(shellQuote("fix the build"), "'fix the build'");
  assert.equal(shellQuote("a; b"), "'a; b'");
  assert.equal(shellQuote("$HOME"), "'$HOME'");
});

test("shellQuote splices embedded single quotes", () => {
  assert.equal(shellQuote("it's"), `'it'"'"'s'`);
});

test("shellJoin quotes each argument separately", () => {
  assert.equal(
    shellJoin(["qchat", "chat", "finish the task; rm -rf /"]),
    "qchat chat 'finish the task; rm -rf /'"
  );
});

test("sh reads every quoted value back as one literal word", () => {
  const samples = [
    "",
    "plain",
    `it's "quoted"`,
    "`whoami`",
    "$HOME and ${PATH} and $(id)",
    "finish the task; echo injected",
    "line one\nline two",
    "back\\slash",
    "tab\tseparated",
    "*.ts",
    "a && b || c > out.txt",
    "'''"
  ];
  for (const value of samples) {
    const out = shellEcho(`set -- ${shellQuote(value)}; printf '%s|' "$#"; printf '%s' "$1"`);
    assert.equal(out, `1|${value}`);
  }
});
