import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import {
  ApiHeader,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { CryptoService } from '../../common/crypto/crypto.service';
import {
  Caller,
  CALLER_HEADER,
} from '../../common/decorators/caller.decorator';
import { ParseWeiPipe } from '../../common/pipes/parse-wei.pipe';
import { Address } from '../../common/types/common.types';
import { FeeService } from '../../fee/fee.service';
import {
  ApproveDto,
  DeployTokenDto,
  TransferDto,
  TransferFromDto,
} from '../dto/token.dto';
import { TokenFactoryService } from '../token-factory.service';
import { TokenService } from '../token.service';
import { UpgradeService } from '../upgrade.service';

/**
 * TokenController
 *
 * 제공하는 API:
 * - POST /token/deploy: 토큰 배포 (한 번만)
 * - GET /token/info: 토큰 정보
 * - GET /token/balance/:address, GET /token/allowance/:owner/:spender
 * - POST /token/transfer, /token/approve, /token/transfer-from
 * - GET /token/fees/quote/:amount: 전송 수수료 계산
 * - GET /token/fees/exemptions: 수수료 면제 계정
 * - GET /token/upgrades: 로직 버전 기록
 * - POST /token/create-wallet: 새 지갑 생성 (개발용)
 *
 * 호출자는 x-caller-address 헤더로 지정한다.
 */
@ApiTags('token')
@Controller('token')
export class TokenController {
  constructor(
    private readonly tokenService: TokenService,
    private readonly tokenFactory: TokenFactoryService,
    private readonly feeService: FeeService,
    private readonly cryptoService: CryptoService,
    private readonly upgradeService: UpgradeService,
  ) {}

  @Post('deploy')
  @ApiOperation({
    summary: '토큰 배포',
    description:
      '시스템 계정을 기록하고 제네시스 배분 (풀 10%, 트레저리 90%)과 팀 베스팅을 설정합니다.',
  })
  @ApiResponse({ status: 201, description: '인스턴스/로직 주소' })
  @ApiResponse({ status: 409, description: '이미 배포됨' })
  deploy(@Body() dto: DeployTokenDto) {
    return this.tokenFactory.deploy(dto);
  }

  @Get('info')
  @ApiOperation({ summary: '토큰 정보 조회' })
  getInfo() {
    return this.tokenService.getInfo();
  }

  @Get('balance/:address')
  @ApiOperation({ summary: '잔액 조회 (Wei)' })
  @ApiParam({ name: 'address', example: '0x' + '1'.repeat(40) })
  getBalance(@Param('address') address: string) {
    return { address, balance: this.tokenService.balanceOf(address) };
  }

  @Get('allowance/:owner/:spender')
  @ApiOperation({ summary: 'allowance 조회 (Wei)' })
  getAllowance(
    @Param('owner') owner: string,
    @Param('spender') spender: string,
  ) {
    return {
      owner,
      spender,
      allowance: this.tokenService.allowance(owner, spender),
    };
  }

  @Get('fees/quote/:amount')
  @ApiOperation({
    summary: '전송 수수료 계산',
    description: '면제 대상이 아닌 전송에 적용될 수수료를 계산합니다.',
  })
  quote(@Param('amount', ParseWeiPipe) amount: bigint) {
    return this.feeService.quote(amount);
  }

  @Get('fees/exemptions')
  @ApiOperation({ summary: '수수료 면제 계정 목록' })
  getExemptAccounts() {
    return { accounts: this.feeService.getExemptAccounts() };
  }

  @Get('upgrades')
  @ApiOperation({ summary: '로직 버전 기록 (오래된 순)' })
  getUpgradeHistory() {
    return this.upgradeService.getHistory();
  }

  /**
   * 전송
   *
   * 수수료 (team, staking, burn)를 뗀 금액이 수신자에게 간다.
   * 보내는 쪽이나 받는 쪽이 면제 대상이면 수수료 없음.
   */
  @Post('transfer')
  @HttpCode(200)
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: '전송' })
  @ApiResponse({ status: 200, description: '수수료 분해' })
  @ApiResponse({ status: 422, description: '잔액 부족 / 일시 정지' })
  transfer(@Caller() caller: Address, @Body() dto: TransferDto) {
    return this.tokenService.transfer(caller, dto.to, BigInt(dto.amount));
  }

  @Post('approve')
  @HttpCode(200)
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: 'allowance 설정' })
  approve(@Caller() caller: Address, @Body() dto: ApproveDto) {
    this.tokenService.approve(caller, dto.spender, BigInt(dto.amount));
    return {
      owner: caller,
      spender: dto.spender,
      allowance: this.tokenService.allowance(caller, dto.spender),
    };
  }

  @Post('transfer-from')
  @HttpCode(200)
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: 'allowance로 전송' })
  transferFrom(@Caller() caller: Address, @Body() dto: TransferFromDto) {
    return this.tokenService.transferFrom(
      caller,
      dto.from,
      dto.to,
      BigInt(dto.amount),
    );
  }

  /**
   * 새 지갑 생성
   *
   * 개발용: 서버에서 키를 만들어 돌려준다.
   */
  @Post('create-wallet')
  @ApiOperation({
    summary: '새 지갑 생성',
    description: '개인키, 공개키, 주소를 반환합니다. (개발용)',
  })
  createWallet() {
    return this.cryptoService.generateKeyPair();
  }
}
