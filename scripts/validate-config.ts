#!/usr/bin/env node
/**
 * Script de Validação de Configuração
 *
 * Valida as variáveis de ambiente e avisa sobre combinações arriscadas.
 *
 * Uso: npm run validate-config
 * ou: npx tsx scripts/validate-config.ts
 */

import { loadConfig } from '../src/infrastructure/config/config.js';
import type { Config } from '../src/infrastructure/config/config.js';

interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function validateConfig(): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
  };

  try {
    const config = loadConfig();

    console.log('✅ Configuração carregada com sucesso!\n');

    validateDatabaseConfig(config, result);
    validateObservabilityConfig(config, result);
  } catch (error) {
    result.valid = false;
    if (error instanceof Error) {
      result.errors.push(error.message);
    } else {
      result.errors.push('Erro desconhecido ao validar configuração');
    }
  }

  return result;
}

function validateDatabaseConfig(config: Config, result: ValidationResult): void {
  console.log('🔍 Validando configuração do banco...');

  if (config.databaseDriver === 'memory') {
    result.warnings.push('⚠️  DATABASE_DRIVER=memory - dados são perdidos ao reiniciar');
  } else if (config.databasePath === ':memory:') {
    result.warnings.push('⚠️  DATABASE_PATH=:memory: - banco SQLite descartável');
  }

  if (config.nodeEnv === 'production' && config.databaseDriver === 'memory') {
    result.errors.push('DATABASE_DRIVER=memory não é permitido em produção');
    result.valid = false;
  }

  console.log('✅ Configuração do banco OK\n');
}

function validateObservabilityConfig(config: Config, result: ValidationResult): void {
  console.log('🔍 Validando configuração de logs...');

  if (config.nodeEnv === 'production' && (config.logLevel === 'debug' || config.logLevel === 'trace')) {
    result.warnings.push(`⚠️  LOG_LEVEL=${config.logLevel} em produção - volume alto de logs`);
  }

  console.log('✅ Configuração de logs OK\n');
}

function main(): void {
  console.log('🚀 Validando configuração da User Management API...\n');

  const result = validateConfig();

  if (result.warnings.length > 0) {
    console.log('\n📋 Avisos:');
    result.warnings.forEach((warning) => console.log(`  ${warning}`));
  }

  if (result.errors.length > 0) {
    console.log('\n❌ Erros encontrados:');
    result.errors.forEach((error) => console.log(`  - ${error}`));
    console.log('\n💡 Corrija os erros acima e tente novamente.\n');
    process.exit(1);
  }

  if (result.valid) {
    console.log('\n✅ Todas as validações passaram!');
    if (result.warnings.length > 0) {
      console.log('⚠️  Verifique os avisos acima antes de prosseguir.\n');
    } else {
      console.log('🎉 Configuração pronta para uso!\n');
    }
    process.exit(0);
  }
}

main();
