// Vitest renames its worker processes ("node (vitest N)"), which on Linux
// overwrites /proc/<pid>/cmdline. Restore the worker's real command line so
// command-line based checks see the process as it was actually started.
process.title = [process.execPath, ...process.argv.slice(1)].join(' ');
