import 'reflect-metadata';
import { Container } from 'inversify';
import { IEscrowRepository } from './domain/repositories/IEscrowRepository';
import { IMediatorRepository } from './domain/repositories/IMediatorRepository';
import { IContractEventRepository } from './domain/repositories/IContractEventRepository';
import { IClock } from './domain/services/IClock';
import { ILedger } from './domain/services/ILedger';
import { IPriceFeedProvider } from './domain/services/IPriceFeed';
import { ICheckpointed, ITransactionScope } from './domain/services/ITransactionScope';
import { InMemoryEscrowRepository } from './infrastructure/repositories/InMemoryEscrowRepository';
import { InMemoryMediatorRepository } from './infrastructure/repositories/InMemoryMediatorRepository';
import { InMemoryContractEventRepository } from './infrastructure/repositories/InMemoryContractEventRepository';
import { InMemoryTransactionScope } from './infrastructure/repositories/InMemoryTransactionScope';
import { MongoEscrowRepository } from './infrastructure/repositories/MongoEscrowRepository';
import { MongoMediatorRepository } from './infrastructure/repositories/MongoMediatorRepository';
import { MongoContractEventRepository } from './infrastructure/repositories/MongoContractEventRepository';
import { MongoDBConnection } from './infrastructure/database/MongoDBConnection';
import { InMemoryLedger } from './infrastructure/ledger/InMemoryLedger';
import { SystemClock } from './infrastructure/time/SystemClock';
import { ChainlinkPriceFeedProvider } from './infrastructure/oracle/ChainlinkPriceFeed';
import { InMemoryPriceFeedProvider } from './infrastructure/oracle/InMemoryPriceFeed';
import { SerialExecutor } from './infrastructure/coordination/SerialExecutor';
import { DecisionCoordinator } from './infrastructure/coordination/DecisionCoordinator';
import { JwtService } from './infrastructure/auth/JwtService';
import { SignatureAuthService } from './infrastructure/auth/SignatureAuthService';
import { CreateEscrowUseCase } from './application/useCases/CreateEscrowUseCase';
import { DepositUseCase } from './application/useCases/DepositUseCase';
import { SelectWinnerUseCase } from './application/useCases/SelectWinnerUseCase';
import { WithdrawUseCase } from './application/useCases/WithdrawUseCase';
import { CreateOracleMediatorUseCase } from './application/useCases/CreateOracleMediatorUseCase';
import { ResolveBetUseCase } from './application/useCases/ResolveBetUseCase';
import { MonitorMediatorsUseCase } from './application/useCases/MonitorMediatorsUseCase';
import { TransferFundsUseCase } from './application/useCases/TransferFundsUseCase';
import { MintFundsUseCase } from './application/useCases/MintFundsUseCase';
import { SetFeedPriceUseCase } from './application/useCases/SetFeedPriceUseCase';
import { QueryContractsUseCase } from './application/useCases/QueryContractsUseCase';

function registerBindings(target: Container): void {
  // Database connection
  target.bind<MongoDBConnection>('MongoDBConnection').to(MongoDBConnection).inSingletonScope();

  // Repositories - MongoDB when enabled, in-memory otherwise
  if (process.env.USE_MONGODB === 'true') {
    target.bind<IEscrowRepository>('IEscrowRepository').to(MongoEscrowRepository).inSingletonScope();
    target.bind<IMediatorRepository>('IMediatorRepository').to(MongoMediatorRepository).inSingletonScope();
    target.bind<IContractEventRepository>('IContractEventRepository').to(MongoContractEventRepository).inSingletonScope();
    target.bind<ITransactionScope>('ITransactionScope').toService('MongoDBConnection');
  } else {
    target.bind<InMemoryEscrowRepository>(InMemoryEscrowRepository).toSelf().inSingletonScope();
    target.bind<InMemoryMediatorRepository>(InMemoryMediatorRepository).toSelf().inSingletonScope();
    target.bind<InMemoryContractEventRepository>(InMemoryContractEventRepository).toSelf().inSingletonScope();
    target.bind<IEscrowRepository>('IEscrowRepository').toService(InMemoryEscrowRepository);
    target.bind<IMediatorRepository>('IMediatorRepository').toService(InMemoryMediatorRepository);
    target.bind<IContractEventRepository>('IContractEventRepository').toService(InMemoryContractEventRepository);

    // every store a unit of work writes to is checkpointed with it
    target.bind<ICheckpointed>('ICheckpointedStore').toService(InMemoryEscrowRepository);
    target.bind<ICheckpointed>('ICheckpointedStore').toService(InMemoryMediatorRepository);
    target.bind<ICheckpointed>('ICheckpointedStore').toService(InMemoryContractEventRepository);
    target.bind<ITransactionScope>('ITransactionScope').to(InMemoryTransactionScope).inSingletonScope();
  }

  // Execution substrate
  target.bind<ILedger>('ILedger').to(InMemoryLedger).inSingletonScope();
  target.bind<IClock>('IClock').to(SystemClock).inSingletonScope();
  target.bind<SerialExecutor>('SerialExecutor').to(SerialExecutor).inSingletonScope();

  // Oracle
  if (process.env.USE_REAL_ORACLE === 'true') {
    target.bind<IPriceFeedProvider>('IPriceFeedProvider').to(ChainlinkPriceFeedProvider).inSingletonScope();
  } else {
    target.bind<IPriceFeedProvider>('IPriceFeedProvider').to(InMemoryPriceFeedProvider).inSingletonScope();
  }

  // Auth
  target.bind<JwtService>('JwtService').to(JwtService).inSingletonScope();
  target.bind<SignatureAuthService>('SignatureAuthService').to(SignatureAuthService).inSingletonScope();

  // Coordination
  target.bind<DecisionCoordinator>('DecisionCoordinator').toDynamicValue(
    () => new DecisionCoordinator(parseInt(process.env.DECISION_COOLDOWN_MS || '15000', 10))
  ).inSingletonScope();

  // Use cases
  target.bind<CreateEscrowUseCase>('CreateEscrowUseCase').to(CreateEscrowUseCase);
  target.bind<DepositUseCase>('DepositUseCase').to(DepositUseCase);
  target.bind<SelectWinnerUseCase>('SelectWinnerUseCase').to(SelectWinnerUseCase);
  target.bind<WithdrawUseCase>('WithdrawUseCase').to(WithdrawUseCase);
  target.bind<CreateOracleMediatorUseCase>('CreateOracleMediatorUseCase').to(CreateOracleMediatorUseCase);
  target.bind<ResolveBetUseCase>('ResolveBetUseCase').to(ResolveBetUseCase);
  target.bind<MonitorMediatorsUseCase>('MonitorMediatorsUseCase').to(MonitorMediatorsUseCase);
  target.bind<TransferFundsUseCase>('TransferFundsUseCase').to(TransferFundsUseCase);
  target.bind<MintFundsUseCase>('MintFundsUseCase').to(MintFundsUseCase);
  target.bind<SetFeedPriceUseCase>('SetFeedPriceUseCase').to(SetFeedPriceUseCase);
  target.bind<QueryContractsUseCase>('QueryContractsUseCase').to(QueryContractsUseCase);
}

const container = new Container();
registerBindings(container);

/**
 * Drops every binding and singleton and registers them again from the
 * current environment. Tests use it to start from empty state.
 */
export function resetContainer(): void {
  container.unbindAll();
  registerBindings(container);
}

export { container };
