import type { DefaultCategoryId } from './types.js';

/**
 * One representative question per built-in category, used for smoke checks
 * of a running service (`GET /test`, `quecat check`).
 */
export const SAMPLE_QUESTIONS: Readonly<Record<DefaultCategoryId, string>> = {
  yorum: 'Bu ürün hakkında yorum yapabilir misiniz?',
  ozel_talep: 'Özel bir sipariş vermek istiyorum',
  teknik: 'Teknik destek alabilir miyim?',
  yanlis_hasarli: 'Ürün hasarlı geldi',
  orijinallik: 'Bu ürün orijinal mi?',
  iade_degisim: 'İade nasıl yapılır?',
  stok: 'Bu ürün stokta var mı?',
  kargo_bilgileri: 'Hangi kargo firması kullanıyorsunuz?',
  siparis_teslimat: 'Siparişim ne zaman teslim edilecek?',
};
