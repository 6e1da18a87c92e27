import log from 'electron-log/node';

// Keep test output clean; individual tests assert behavior, not log lines
log.transports.console.level = false;
log.transports.file.level = false;
