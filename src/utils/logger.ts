import winston from 'winston';
import { format } from 'winston';
import fs from 'fs';
import path from 'path';
import config from '../config/config';

// 文件输出，仅在配置了 LOG_DIR 时启用
const createFileTransports = (dir: string) => {
  const logDir = path.resolve(dir);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  return [
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error'
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'app.log')
    })
  ];
};

const logger = winston.createLogger({
  level: config.logLevel,
  silent: process.env.NODE_ENV === 'test',
  format: format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.errors({ stack: true }),
    format.splat(),
    format.json()
  ),
  defaultMeta: { service: 'sulid-service' },
  transports: [
    // 控制台输出
    new winston.transports.Console({
      format: format.combine(
        format.colorize(),
        format.printf(
          info => `${info.timestamp} ${info.level}: ${info.message} ${
            Object.keys(info).length > 3 ?
              JSON.stringify(Object.fromEntries(
                Object.entries(info).filter(
                  ([key]) => !['timestamp', 'service', 'level', 'message'].includes(key)
                )
              )) : ''
          }`
        )
      )
    }),
    ...(config.logDir ? createFileTransports(config.logDir) : [])
  ]
});

export default logger;
