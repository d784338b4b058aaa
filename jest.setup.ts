// keep pino quiet under test unless a run asks for output
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent'
