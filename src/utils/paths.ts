import { readFileSync } from "node:fs";
import { userInfo } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { isErrnoException } from "./errno.js";

export interface HomeLookup {
  currentHome: () => string;
  homeOf: (user: string) => string | undefined;
}

export const passwdHomeLookup: HomeLookup = {
  currentHome: () => userInfo().homedir,
  homeOf: (user) => findHomeInPasswd(readPasswdFile(), user)
};

// Reads the password database, not $HOME, which a remote user may be able to set.
export function expandUserNoHome(path: string, lookup: HomeLookup = passwdHomeLookup): string {
  if (!path.startsWith("~")) {
    return path;
  }

  const separatorIndex = path.indexOf("/");
  const userPart = separatorIndex === -1 ? path.slice(1) : path.slice(1, separatorIndex);
  const rest = separatorIndex === -1 ? "" : path.slice(separatorIndex + 1);

  const home = userPart === "" ? lookup.currentHome() : lookup.homeOf(userPart);
  if (home === undefined) {
    return path;
  }

  return rest === "" ? home : join(home, rest);
}

export function resolveUserPath(path: string, options: { cwd?: string; lookup?: HomeLookup } = {}): string {
  const expanded = expandUserNoHome(path, options.lookup);
  return isAbsolute(expanded) ? resolve(expanded) : resolve(options.cwd ?? process.cwd(), expanded);
}

export function findHomeInPasswd(passwd: string, user: string): string | undefined {
  for (const line of passwd.split(/\r?\n/)) {
    if (line === "" || line.startsWith("#")) {
      continue;
    }

    // name:password:uid:gid:gecos:home:shell
    const fields = line.split(":");
    if (fields.length >= 7 && fields[0] === user && fields[5] !== "") {
      return fields[5];
    }
  }

  return undefined;
}

function readPasswdFile(): string {
  try {
    return readFileSync("/etc/passwd", "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return "";
    }

    throw error;
  }
}
