import { Module } from '@nestjs/common';
import { CoreModule } from '../../core/core.module';
import { IyzipayApiClientService } from './adapters/iyzipay-api-client.service';
import { PaymentsController } from './controllers/payments.controller';
import { IyzipayPaymentService } from './payments/iyzipay-payment.service';

@Module({
  imports: [CoreModule],
  controllers: [PaymentsController],
  providers: [IyzipayApiClientService, IyzipayPaymentService],
  exports: [IyzipayApiClientService, IyzipayPaymentService],
})
export class IyzipayModule {}
