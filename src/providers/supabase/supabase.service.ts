import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { StorageError } from '../../common/exceptions/domain.exceptions';

@Injectable()
export class SupabaseService implements OnModuleInit {
  private readonly logger = new Logger(SupabaseService.name);
  private client: SupabaseClient | null = null;

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    if (this.configService.get<string>('database.driver') !== 'supabase') {
      return;
    }

    const url = this.configService.get<string>('supabase.url');
    const serviceRoleKey = this.configService.get<string>('supabase.serviceRoleKey');

    if (!url || !serviceRoleKey) {
      this.logger.warn('Supabase configuration missing');
      return;
    }

    this.client = createClient(url, serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });

    this.logger.log('Supabase client initialized');
  }

  getClient(): SupabaseClient {
    if (!this.client) {
      throw new StorageError('Supabase client is not configured');
    }
    return this.client;
  }

  /**
   * 获取数据库表
   */
  from(table: string) {
    return this.getClient().from(table);
  }

  /**
   * 调用数据库函数（事务性操作都放在函数里）
   */
  rpc(fn: string, args: Record<string, unknown>) {
    return this.getClient().rpc(fn, args);
  }
}
