import type { SyncItem } from "./types";

export function createStarterItems(): SyncItem[] {
  return [
    {
      name: "my-file",
      action: "symlink",
      src: "./my-file.txt",
      dest: "~/my-file.txt"
    }
  ];
}
