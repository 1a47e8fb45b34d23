import winston from 'winston';
import path from 'path';

const isTest = process.env.NODE_ENV === 'test';
const dataDir = path.join(__dirname, '../../data');

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    return `${timestamp} [${level.toUpperCase()}]: ${message} ${stack || ''}`;
  })
);

const fileTransports: winston.transport[] = isTest ? [] : [
  // Write all logs to the service log file
  new winston.transports.File({
    filename: path.join(dataDir, 'push-service.log'),
    maxsize: 5242880, // 5MB
    maxFiles: 5,
  }),
];

// Configure the logger
const logger = winston.createLogger({
  level: isTest ? 'warn' : process.env.LOG_LEVEL || 'info',
  format: logFormat,
  transports: [
    // Write to console
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      )
    }),
    ...fileTransports,
  ],
  exceptionHandlers: isTest ? undefined : [
    new winston.transports.File({
      filename: path.join(dataDir, 'exceptions.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 2,
    })
  ],
  rejectionHandlers: isTest ? undefined : [
    new winston.transports.File({
      filename: path.join(dataDir, 'rejections.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 2,
    })
  ]
});

export default logger;
