import 'reflect-metadata';
import { Logger } from '@nestjs/common';

// 测试输出里不打印 Nest 日志
Logger.overrideLogger(false);
