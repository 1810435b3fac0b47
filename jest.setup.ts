// Keep test output to the reporter; loggers created before initLogger read this.
process.env.DISPLAY_PROFILES_LOG_LEVEL = 'silent';
